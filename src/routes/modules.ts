import { Router } from 'express';
import { z } from 'zod';
import { toModuleDetailView, toModuleView } from '../services/study/progress';
import type { StudyStore } from '../services/study/studyStore';
import { parseCalendarDate } from '../utils/dates';
import { NotFoundError, ValidationError, handleRouteError } from '../utils/errors';
import logger from '../utils/logger';
import { parseBody, parseIdParam } from '../utils/validation';

const moduleSchema = z.object({
  name: z
    .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
    .trim()
    .min(1, 'name must not be empty')
    .max(100, 'name must be at most 100 characters'),
  target_hours: z
    .number({ required_error: 'target_hours is required', invalid_type_error: 'target_hours must be a number' })
    .finite('target_hours must be a finite number')
    .min(0, 'target_hours must not be negative'),
  exam_date: z.string({ invalid_type_error: 'exam_date must be a string' }).nullish()
});

export function createModulesRouter(store: StudyStore): Router {
  const router = Router();

  /**
   * POST /api/modules
   * Body: { name, target_hours, exam_date? (YYYY-MM-DD) }
   */
  router.post('/api/modules', async (req, res) => {
    try {
      const data = parseBody(moduleSchema, req.body);

      let examDate: string | null = null;
      if (data.exam_date) {
        examDate = parseCalendarDate(data.exam_date);
        if (!examDate) {
          throw new ValidationError('Invalid date format, use YYYY-MM-DD');
        }
      }

      const module = await store.createModule({
        name: data.name,
        targetHours: data.target_hours,
        examDate
      });

      logger.info({ moduleId: module.id, name: module.name }, 'Module created');
      res.status(201).json(toModuleView(module));
    } catch (err) {
      handleRouteError(err, res, 'Failed to create module');
    }
  });

  /**
   * GET /api/modules
   * All modules with their current progress
   */
  router.get('/api/modules', async (_req, res) => {
    try {
      const modules = await store.listModules();
      res.json(modules.map(toModuleView));
    } catch (err) {
      handleRouteError(err, res, 'Failed to list modules');
    }
  });

  /**
   * GET /api/modules/:id
   * Module details including all of its sessions
   */
  router.get('/api/modules/:id', async (req, res) => {
    try {
      const id = parseIdParam(req.params.id);
      const module = id === null ? null : await store.getModule(id);
      if (!module) {
        throw new NotFoundError('Module not found');
      }

      const sessions = await store.listModuleSessions(module.id);
      res.json(toModuleDetailView(module, sessions));
    } catch (err) {
      handleRouteError(err, res, 'Failed to load module');
    }
  });

  /**
   * DELETE /api/modules/:id
   * Removes the module and every session logged against it
   */
  router.delete('/api/modules/:id', async (req, res) => {
    try {
      const id = parseIdParam(req.params.id);
      const deleted = id === null ? null : await store.deleteModule(id);
      if (!deleted) {
        throw new NotFoundError('Module not found');
      }

      logger.info({ moduleId: id, removedSessions: deleted.removedSessions }, 'Module deleted');
      res.json({ message: `Module "${deleted.name}" deleted` });
    } catch (err) {
      handleRouteError(err, res, 'Failed to delete module');
    }
  });

  return router;
}
