import type { NextFunction, Request, Response } from 'express';
import { AIServiceError } from '../modules/ai/ai.service.js';
import { MetadataExtractionError } from '../modules/metadata/metadata-extractor.js';
import type { ApiErrorBody } from '../types/index.js';
import { AppError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('HTTP');

const AI_STATUS: Record<AIServiceError['code'], number> = {
  AI_CONFIGURATION_ERROR: 503,
  AI_REQUEST_FAILED: 502,
  AI_RESPONSE_INVALID: 502,
  AI_UNSAFE_QUERY: 422
};

function toErrorBody(err: unknown): { status: number; body: ApiErrorBody } {
  if (err instanceof AppError) {
    return { status: err.statusCode, body: { success: false, error: err.message, details: err.details } };
  }
  if (err instanceof AIServiceError) {
    return { status: AI_STATUS[err.code], body: { success: false, error: err.message, details: err.details } };
  }
  if (err instanceof MetadataExtractionError) {
    return { status: 500, body: { success: false, error: err.message, details: err.details } };
  }
  // body-parser marks malformed JSON with a 4xx `status`
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return { status: err.status, body: { success: false, error: 'Invalid request', details: err.message } };
  }
  return { status: 500, body: { success: false, error: 'An unexpected error occurred', details: 'Internal server error' } };
}

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const { status, body } = toErrorBody(err);
  if (status >= 500) {
    logger.error(`${req.method} ${req.path}`, err);
  }

  res.status(status).json({
    ...body,
    // In development, send the stack trace to help debug
    ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack })
  });
};
