import { config } from '../../config/env.config.js';

export const redisConfig = {
  url: config.REDIS_URL,
  prefixes: {
    bookings: `${config.REDIS_PREFIX}:bookings`,
  },
} as const;
