import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

/**
 * Exception thrown when a write would duplicate a unique key
 * (duplicate username, duplicate casting triple, repeated link row)
 */
export class RecordConflictException extends BaseException {
  constructor(message: string, context: ExceptionContext = {}, originalError?: Error) {
    super(message, HttpStatus.CONFLICT, 'CONFLICT_ERROR', context, originalError);
  }
}
