/**
 * Operational Error Handling
 *
 * Error classes shared by the operational store packages and the handler
 * that renders them as JSON from hono routes.
 */

import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ERROR_CODES, HTTP_STATUS, type ErrorCode } from '../constants';
import { createLogger } from './logger';

const log = createLogger().module('OPERATIONAL-ERROR');

/**
 * Base error for the operational store packages
 */
export class OperationalError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_SERVER_ERROR
  ) {
    super(message);
    this.name = 'OperationalError';
    this.code = code;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { error: string; error_description: string } {
    return {
      error: this.code,
      error_description: this.message,
    };
  }
}

/**
 * Invalid options or identifiers detected at construction time. Never retried.
 */
export class ConfigurationError extends OperationalError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ERROR_CODES.CONFIGURATION_INVALID, message, HTTP_STATUS.BAD_REQUEST);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A database call that failed for a reason other than a concurrency conflict
 */
export class StoreError extends OperationalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.STORE_FAILURE, message, HTTP_STATUS.SERVICE_UNAVAILABLE);
    this.name = 'StoreError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * hono `onError` handler. HTTP exceptions (e.g. from bearerAuth) keep their
 * own response; operational errors are rendered as a JSON error body; anything
 * else becomes a generic 500 so internals are not leaked.
 */
export const handleOperationalError: ErrorHandler = (error, c) => {
  if (error instanceof HTTPException) {
    return error.getResponse();
  }

  if (error instanceof OperationalError) {
    log.error(`Operational error [${error.statusCode}]`, {
      errorCode: error.code,
      path: c.req.path,
    });
    return jsonResponse(error.toJSON(), error.statusCode);
  }

  log.error('Unhandled route error', { path: c.req.path }, error instanceof Error ? error : undefined);
  return jsonResponse(
    { error: ERROR_CODES.SERVER_ERROR, error_description: 'Internal server error' },
    HTTP_STATUS.INTERNAL_SERVER_ERROR
  );
};

// Response constructor used directly to avoid status literal typing on c.json()
function jsonResponse(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      'Content-Type': 'application/json',
    },
  });
}
