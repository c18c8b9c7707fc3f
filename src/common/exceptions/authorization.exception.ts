import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

/**
 * Exception thrown when the caller's role does not allow the requested operation
 */
export class AuthorizationException extends BaseException {
  constructor(
    public readonly caller: string,
    public readonly operation: string,
    message: string,
    context: ExceptionContext = {},
  ) {
    super(message, HttpStatus.FORBIDDEN, 'AUTHORIZATION_ERROR', {
      caller,
      operation,
      ...context,
    });
  }
}
