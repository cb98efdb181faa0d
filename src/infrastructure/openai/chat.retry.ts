import { setTimeout as sleep } from 'timers/promises';

import { logger } from '@utils/logger.js';

export interface RetryOptions {
  retries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Tag used in retry log lines. */
  label?: string;
}

/** Retries rate limits, timeouts and 5xx responses with jittered exponential backoff. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, baseDelayMs = 250, maxDelayMs = 4000, label = 'openai' } = options;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      const status = extractStatus(error);
      if (attempt >= retries || !isRetryableStatus(status)) {
        throw error;
      }
      const delay = computeDelay(attempt, baseDelayMs, maxDelayMs);
      logger.warn(`[${label}] retrying after failure`, { attempt: attempt + 1, status, delay });
      await sleep(delay);
    }
  }
}

export function computeDelay(attempt: number, base: number, max: number): number {
  const capped = Math.min(max, base * 2 ** attempt);
  const jitter = capped / 2 + Math.random() * (capped / 2);
  return Math.max(base, Math.min(max, Math.round(jitter)));
}

export function isRetryableStatus(status: number | null): boolean {
  if (status === null) return false;
  return status === 408 || status === 429 || status >= 500;
}

export function extractStatus(error: unknown): number | null {
  if (!error || typeof error !== 'object') return null;

  const candidates: unknown[] = [];
  if ('status' in error) candidates.push(error.status);
  if ('response' in error && error.response && typeof error.response === 'object' && 'status' in error.response) {
    candidates.push(error.response.status);
  }

  for (const candidate of candidates) {
    const parsed = parseStatus(candidate);
    if (parsed !== null) return parsed;
  }
  return null;
}

function parseStatus(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isNaN(parsed)) return parsed;
  }
  return null;
}
