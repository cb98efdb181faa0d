import { createClient } from 'redis';

import { logger } from '@utils/logger.js';

import { redisConfig } from './redis.config.js';

export const redis = createClient({
  url: redisConfig.url,
});

redis.on('error', (err: Error) => {
  logger.error('[redis] error', { message: err.message });
});

redis.on('connect', () => {
  logger.info('[redis] connected');
});

redis.on('end', () => {
  logger.info('[redis] connection closed');
});

export async function connectRedis(): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redis.isOpen) {
    await redis.quit();
  }
}

export function registerRedisShutdownSignals(): void {
  const handler = async (signal: NodeJS.Signals) => {
    try {
      logger.info(`[redis] received ${signal}, closing...`);
      await disconnectRedis();
    } finally {
      process.exit(0);
    }
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}
