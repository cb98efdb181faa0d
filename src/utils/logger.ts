import pino from 'pino';

import { config } from '@config/env.config';

const base = pino({
  level: config.LOG_LEVEL,
  base: { app: 'slotfill-assistant', env: config.NODE_ENV },
});

type Level = 'debug' | 'info' | 'warn' | 'error';

function toFields(meta: unknown): Record<string, unknown> {
  if (meta instanceof Error) return { err: meta };
  if (meta && typeof meta === 'object' && !Array.isArray(meta)) {
    return { ...meta };
  }
  return { meta };
}

function at(level: Level) {
  return (message: string, meta?: unknown): void => {
    if (meta === undefined) {
      base[level](message);
      return;
    }
    base[level](toFields(meta), message);
  };
}

export const logger = {
  debug: at('debug'),
  info: at('info'),
  warn: at('warn'),
  error: at('error'),
};
