import { randomUUID } from 'crypto';

import type { ErrorRequestHandler } from 'express';

import { BaseError } from '../core/errors/base-error.js';
import { logger } from '../utils/logger.js';

interface ErrorPayload {
  code: string;
  message: string;
  traceId: string;
  data?: unknown;
}

/** Status carried by body-parser errors (malformed JSON, oversized body). */
function clientStatus(err: unknown): number | null {
  if (err && typeof err === 'object' && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export const errorMiddleware: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const traceId = randomUUID();

  if (err instanceof BaseError) {
    const payload: ErrorPayload = { code: err.code, message: err.message, traceId };
    if (err.data !== undefined) {
      try {
        payload.data = JSON.parse(JSON.stringify(err.data));
      } catch {
        payload.data = String(err.data);
      }
    }
    logger.warn('[http] request failed', { traceId, method: req.method, path: req.path, code: err.code });
    res.status(err.status).json(payload);
    return;
  }

  const status = clientStatus(err);
  if (status !== null) {
    const payload: ErrorPayload = { code: 'BAD_REQUEST', message: 'Malformed request body', traceId };
    res.status(status).json(payload);
    return;
  }

  logger.error('[http] unhandled error', { traceId, method: req.method, path: req.path, err });
  const payload: ErrorPayload = { code: 'INTERNAL_ERROR', message: 'Internal server error', traceId };
  res.status(500).json(payload);
};
