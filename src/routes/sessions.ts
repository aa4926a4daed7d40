import { Router } from 'express';
import { z } from 'zod';
import { toSessionView } from '../services/study/progress';
import type { StudyStore } from '../services/study/studyStore';
import { parseCalendarDate } from '../utils/dates';
import { NotFoundError, ValidationError, handleRouteError } from '../utils/errors';
import logger from '../utils/logger';
import { isStorableId, parseBody, parseIdParam, parseLimit } from '../utils/validation';

// date format is checked after the module lookup
const sessionSchema = z.object({
  module_id: z
    .number({ required_error: 'module_id is required', invalid_type_error: 'module_id must be a number' })
    .int('module_id must be an integer'),
  duration: z
    .number({ required_error: 'duration is required', invalid_type_error: 'duration must be a number' })
    .finite('duration must be a finite number')
    .positive('duration must be greater than 0'),
  date: z.string({ required_error: 'date is required', invalid_type_error: 'date must be a string' }),
  notes: z.string({ invalid_type_error: 'notes must be a string' }).nullish()
});

export function createSessionsRouter(store: StudyStore): Router {
  const router = Router();

  /**
   * POST /api/sessions
   * Body: { module_id, duration (hours), date (YYYY-MM-DD), notes? }
   */
  router.post('/api/sessions', async (req, res) => {
    try {
      const data = parseBody(sessionSchema, req.body);

      const module = isStorableId(data.module_id) ? await store.getModule(data.module_id) : null;
      if (!module) {
        throw new NotFoundError('Module not found');
      }

      const date = parseCalendarDate(data.date);
      if (!date) {
        throw new ValidationError('Invalid date format, use YYYY-MM-DD');
      }

      const session = await store.createSession({
        moduleId: module.id,
        duration: data.duration,
        date,
        notes: data.notes ?? ''
      });

      logger.info({ sessionId: session.id, duration: session.duration, module: module.name }, 'Session created');
      res.status(201).json(toSessionView(session));
    } catch (err) {
      handleRouteError(err, res, 'Failed to create session');
    }
  });

  /**
   * GET /api/sessions?limit=20
   * Most recent sessions first
   */
  router.get('/api/sessions', async (req, res) => {
    try {
      const sessions = await store.listSessions(parseLimit(req.query.limit));
      res.json(sessions.map(toSessionView));
    } catch (err) {
      handleRouteError(err, res, 'Failed to list sessions');
    }
  });

  /**
   * DELETE /api/sessions/:id
   */
  router.delete('/api/sessions/:id', async (req, res) => {
    try {
      const id = parseIdParam(req.params.id);
      const deleted = id === null ? false : await store.deleteSession(id);
      if (!deleted) {
        throw new NotFoundError('Session not found');
      }

      logger.info({ sessionId: id }, 'Session deleted');
      res.json({ message: 'Session deleted' });
    } catch (err) {
      handleRouteError(err, res, 'Failed to delete session');
    }
  });

  return router;
}
