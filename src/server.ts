import path from 'path';
import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config/env';
import type { TextGenerator } from './services/llm/geminiClient';
import { RecommendationService } from './services/recommendation/recommendationService';
import type { StudyStore } from './services/study/studyStore';
import { createDashboardRouter } from './routes/dashboard';
import { createModulesRouter } from './routes/modules';
import { createRecommendRouter } from './routes/recommend';
import { createSessionsRouter } from './routes/sessions';
import logger from './utils/logger';

export interface ServerDeps {
  config: AppConfig;
  store: StudyStore;
  generator: TextGenerator;
}

// body-parser marks request errors with `type` and a 4xx `status`
function bodyParserFailure(err: unknown): { status: number; error: string } | null {
  if (typeof err !== 'object' || err === null) return null;

  const status = 'status' in err ? err.status : undefined;
  if (typeof status !== 'number' || status >= 500) return null;

  const type = 'type' in err ? err.type : undefined;
  if (type === 'entity.parse.failed') return { status: 400, error: 'Malformed JSON body' };
  if (type === 'entity.too.large') return { status, error: 'Request body too large' };
  return { status, error: err instanceof Error ? err.message : 'Bad request' };
}

export function createServer({ config, store, generator }: ServerDeps) {
  const app = express();

  if (config.NODE_ENV === 'development') {
    app.set('json spaces', 2);
  }

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const recommendations = new RecommendationService({
    store,
    generator,
    apiKey: config.GEMINI_API_KEY,
    model: config.GEMINI_MODEL
  });

  // API routes
  app.use(createModulesRouter(store));
  app.use(createSessionsRouter(store));
  app.use(createRecommendRouter(recommendations));
  app.use(createDashboardRouter(store));

  // Front-end (index.html served at /)
  app.use(express.static(path.resolve(process.cwd(), config.STATIC_DIR)));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Resource not found' });
  });

  app.use(
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      const failure = bodyParserFailure(err);
      if (failure) {
        logger.debug({ err }, 'Rejected request body');
        res.status(failure.status).json({ error: failure.error });
        return;
      }
      logger.error({ err }, 'Unhandled error');
      res.status(500).json({ error: 'Internal server error' });
    }
  );

  return app;
}
