import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

/**
 * Exception thrown when an operation would break a structural guarantee,
 * e.g. removing the last active administrator. Raised before any write.
 */
export class InvariantViolationException extends BaseException {
  constructor(
    public readonly invariant: string,
    message: string,
    context: ExceptionContext = {},
  ) {
    super(message, HttpStatus.UNPROCESSABLE_ENTITY, 'INVARIANT_ERROR', {
      invariant,
      ...context,
    });
  }
}
