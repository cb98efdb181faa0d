import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from '@config/env.config';

import { apiRouter } from './api/index.js';
import { errorMiddleware } from './middleware/index.js';
import { connectRedis, registerRedisShutdownSignals } from './infrastructure/redis/redis.client.js';
import { logger } from './utils/logger.js';

export function createApp() {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  app.use('/', apiRouter);
  app.use(errorMiddleware);
  return app;
}

async function bootstrap() {
  if (config.BOOKING_STORE === 'redis') {
    await connectRedis();
    registerRedisShutdownSignals();
  }

  createApp().listen(config.PORT, () => {
    logger.info('[app] listening', { port: config.PORT, store: config.BOOKING_STORE });
  });
}

bootstrap().catch((err: unknown) => {
  logger.error('[app] fatal bootstrap error', err);
  process.exit(1);
});
