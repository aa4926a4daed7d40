import { config } from './config/env';
import { createServer } from './server';
import { closeDatabase, ensureSchema, initDatabase } from './services/database/postgres';
import { GeminiClient } from './services/llm/geminiClient';
import { isApiKeyConfigured } from './services/recommendation/recommendationService';
import { StudyStore } from './services/study/studyStore';
import logger from './utils/logger';

async function bootstrap() {
  if (config.NODE_ENV === 'production' && config.SECRET_KEY === 'dev-secret-key-change-in-production') {
    logger.warn('SECRET_KEY is using the development default');
  }

  let store: StudyStore;
  if (config.DATABASE_URL) {
    const pool = initDatabase(config.DATABASE_URL);
    await ensureSchema(pool);
    store = new StudyStore({ db: pool });
  } else {
    logger.warn('DATABASE_URL not set - using in-memory storage, data is lost on restart');
    store = new StudyStore({ useInMemory: true });
  }

  if (!isApiKeyConfigured(config.GEMINI_API_KEY)) {
    logger.warn('GEMINI_API_KEY not set - AI recommendations disabled');
  }

  const generator = new GeminiClient({
    apiKey: config.GEMINI_API_KEY ?? '',
    model: config.GEMINI_MODEL,
    temperature: config.GEMINI_TEMPERATURE,
    maxOutputTokens: config.GEMINI_MAX_TOKENS,
    timeoutMs: config.GEMINI_TIMEOUT_MS
  });

  const app = createServer({ config, store, generator });

  const server = app.listen(config.PORT, () => {
    logger.info({ store: store.mode, model: generator.model }, `Server listening on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
