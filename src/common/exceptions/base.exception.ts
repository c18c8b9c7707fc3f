import { HttpException, HttpStatus } from '@nestjs/common';

export type ExceptionContext = Record<string, unknown>;

/**
 * Base exception class for domain failures
 * Provides structured error responses with a stable error code and the ids involved
 */
export abstract class BaseException extends HttpException {
  public readonly errorCode: string;
  public readonly context: ExceptionContext;
  public readonly originalError?: Error;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: HttpStatus,
    errorCode: string,
    context: ExceptionContext = {},
    originalError?: Error,
  ) {
    const timestamp = new Date().toISOString();
    const enrichedContext = BaseException.enrichContextStatic(context, originalError);

    super(
      {
        statusCode,
        errorCode,
        message,
        context: enrichedContext,
        timestamp,
      },
      statusCode,
      { cause: originalError },
    );
    this.errorCode = errorCode;
    this.context = enrichedContext;
    this.originalError = originalError;
    this.timestamp = timestamp;
  }

  /**
   * Enrich context with the underlying store error, if any (static method)
   */
  private static enrichContextStatic(
    context: ExceptionContext,
    originalError?: Error,
  ): ExceptionContext {
    const enriched: ExceptionContext = { ...context };

    if (originalError) {
      enriched.original_error = {
        name: originalError.name,
        message: originalError.message,
        ...(process.env.NODE_ENV === 'development' && {
          stack: originalError.stack,
        }),
      };
    }

    return enriched;
  }

  /**
   * Get verbose error details for logging
   */
  getVerboseDetails(): Record<string, unknown> {
    return {
      errorCode: this.errorCode,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
      ...(this.originalError && {
        originalError: {
          name: this.originalError.name,
          message: this.originalError.message,
          stack: this.originalError.stack,
        },
      }),
    };
  }
}
