import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

/**
 * Exception thrown when a write-time business rule rejects a record.
 * The message is the rule's human-readable reason, surfaced verbatim.
 */
export class ValidationException extends BaseException {
  constructor(
    public readonly rule: string,
    message: string,
    context: ExceptionContext = {},
  ) {
    super(message, HttpStatus.BAD_REQUEST, 'VALIDATION_ERROR', {
      rule,
      ...context,
    });
  }
}
