import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import type { AuthenticatedRequest } from '../../auth/interfaces/authenticated-request.interface';
import { BaseException } from '../exceptions/base.exception';

/**
 * Global exception filter that catches all exceptions and formats consistent error responses
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<AuthenticatedRequest>();

    const caller = request.caller?.username;

    let status: number;
    let errorCode: string;
    let message: string;
    let details: Record<string, unknown> | undefined;

    if (exception instanceof BaseException) {
      status = exception.getStatus();
      errorCode = exception.errorCode;
      message = exception.message;
      details = exception.context;
    } else if (exception instanceof HttpException) {
      // NestJS HttpException (ValidationPipe, throttler, routing)
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      errorCode = this.mapStatusToErrorCode(status);

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else {
        message = exception.message || 'An error occurred';
        if ('errors' in exceptionResponse && Array.isArray(exceptionResponse.errors)) {
          details = { errors: exceptionResponse.errors };
        }
      }
    } else if (exception instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorCode = 'INTERNAL_SERVER_ERROR';
      message = exception.message || 'An internal server error occurred';
      details = this.sanitizeError(exception);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorCode = 'UNKNOWN_ERROR';
      message = 'An unknown error occurred';
      details = { original_error: String(exception) };
    }

    const logLine = `${errorCode}: ${message} | Path: ${request.method} ${request.path} | Caller: ${caller || 'none'}`;

    if (status >= 500) {
      this.logger.error(
        logLine,
        process.env.NODE_ENV === 'development' && exception instanceof Error
          ? exception.stack
          : undefined,
      );
    } else {
      this.logger.warn(logLine);
    }

    const errorResponse = {
      statusCode: status,
      errorCode,
      message,
      ...(details && Object.keys(details).length > 0 && { details }),
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    response.status(status).json(errorResponse);
  }

  /**
   * Map HTTP status code to error code
   */
  private mapStatusToErrorCode(status: number): string {
    const mapping: Record<number, string> = {
      [HttpStatus.BAD_REQUEST]: 'BAD_REQUEST',
      [HttpStatus.UNAUTHORIZED]: 'UNAUTHORIZED',
      [HttpStatus.FORBIDDEN]: 'FORBIDDEN',
      [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
      [HttpStatus.METHOD_NOT_ALLOWED]: 'METHOD_NOT_ALLOWED',
      [HttpStatus.CONFLICT]: 'CONFLICT',
      [HttpStatus.UNPROCESSABLE_ENTITY]: 'UNPROCESSABLE_ENTITY',
      [HttpStatus.TOO_MANY_REQUESTS]: 'RATE_LIMIT_EXCEEDED',
      [HttpStatus.INTERNAL_SERVER_ERROR]: 'INTERNAL_SERVER_ERROR',
      [HttpStatus.SERVICE_UNAVAILABLE]: 'SERVICE_UNAVAILABLE',
    };

    return mapping[status] || 'UNKNOWN_ERROR';
  }

  /**
   * Sanitize error for production (no stack traces)
   */
  private sanitizeError(error: Error): Record<string, unknown> {
    if (process.env.NODE_ENV === 'development') {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return {
      name: error.name,
    };
  }
}
