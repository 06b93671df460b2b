import { FastifyError, FastifyInstance } from 'fastify';
import { StoreError, StoreErrorCode, MissingFieldChoiceError } from '../core/errors';
import { logger } from '../observability/logger';

const STATUS_BY_CODE: Record<StoreErrorCode, number> = {
  KEY_STORAGE: 503,
  DECRYPTION: 500,
  CACHE_IO: 503,
  REMOTE_UNAVAILABLE: 503,
  PRECONDITION_FAILED: 409,
  MISSING_FIELD_CHOICE: 400,
  INVALID_CONFLICT_STATE: 409,
  CONFLICT_NOT_FOUND: 404,
  RECORD_UNAVAILABLE: 404,
};

export function statusForError(err: StoreError): number {
  return STATUS_BY_CODE[err.code];
}

/** Maps StoreError codes to HTTP statuses; everything else is a 500 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError | Error, req, reply) => {
    if (err instanceof StoreError) {
      const status = statusForError(err);
      if (status >= 500) logger.warn({ err, url: req.url }, 'Request failed in storage layer');
      return reply.status(status).send({
        error: err.message,
        code: err.code,
        ...(err instanceof MissingFieldChoiceError ? { missingFields: err.missingFields } : {}),
      });
    }
    if ('statusCode' in err && typeof err.statusCode === 'number' && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    logger.error({ err, url: req.url }, 'Unhandled request error');
    return reply.status(500).send({ error: 'Internal server error' });
  });
}
