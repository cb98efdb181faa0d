import { logger } from '@utils/logger.js';

export type Enrichment<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string };

/**
 * Runs an optional external call. Failures are logged and replaced by
 * `fallback`; they never reach the caller.
 */
export async function tryEnrich<T>(
  name: string,
  fn: () => Promise<T>,
  fallback: () => T,
): Promise<Enrichment<T>> {
  try {
    return { status: 'ok', value: await fn() };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.warn(`[enrich] ${name} degraded`, { reason });
    return { status: 'degraded', value: fallback(), reason };
  }
}
