import { logger } from './logger';

export class PageImagesError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public recoverable: boolean = false
  ) {
    super(message);
    this.name = 'PageImagesError';
  }
}

/**
 * Deployment misconfiguration, e.g. an unknown blacklist source kind.
 * Never recovered from.
 */
export class ConfigurationError extends PageImagesError {
  constructor(message: string) {
    super(message, 'config_error', 500, false);
    this.name = 'ConfigurationError';
  }
}

export class InvalidParameterError extends PageImagesError {
  constructor(message: string, code: string = 'badparams') {
    super(message, code, 400, true);
    this.name = 'InvalidParameterError';
  }
}

export class InvalidContinueError extends InvalidParameterError {
  constructor() {
    super('Invalid continue param. You should pass the original value returned by the previous query', 'badcontinue');
    this.name = 'InvalidContinueError';
  }
}

export interface ErrorResponse {
  status: number;
  body: { error: { code: string; info: string } };
}

function describe(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) return { message: error.message, stack: error.stack };
  return { message: String(error) };
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof PageImagesError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
    if (error.recoverable) {
      logger.debug(`[${context}] Error is recoverable, reported to caller`);
    }
    return;
  }
  const { message, stack } = describe(error);
  logger.error(`[${context}] Unexpected error: ${message}`);
  if (stack) {
    logger.debug(`[${context}] Stack trace: ${stack}`);
  }
}

/**
 * Wraps async functions with error handling
 */
export function withErrorHandling<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  context: string
): (...args: A) => Promise<R> {
  return async (...args: A) => {
    try {
      return await fn(...args);
    } catch (error) {
      handleError(error, context);
      throw error;
    }
  };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof PageImagesError) {
    return {
      status: error.statusCode,
      body: { error: { code: error.code, info: error.message } },
    };
  }
  return {
    status: 500,
    body: { error: { code: 'internal_error', info: 'Internal server error' } },
  };
}
