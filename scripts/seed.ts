import { config } from '@config/env.config';

import { getBookingStore } from '@core/repositories/index.js';

import { disconnectRedis } from '@infra/redis/redis.client.js';

import { logger } from '@utils/logger.js';
import { todayISO } from '@utils/time.js';

async function main() {
  const store = getBookingStore();
  const reset = process.argv.includes('--reset');
  if (reset) {
    await store.resetAll();
  }
  const seeded = await store.seedDemoData(todayISO());
  logger.info('[seed] demo bookings written', {
    store: config.BOOKING_STORE,
    reset,
    ids: seeded.map((b) => b.id),
  });
}

main()
  .catch((err: unknown) => {
    logger.error('[seed] failed', err);
    process.exitCode = 1;
  })
  .finally(() => disconnectRedis());
