import { HttpStatus } from '@nestjs/common';
import { BaseException, ExceptionContext } from './base.exception';

/**
 * Exception thrown when a referenced record does not exist
 */
export class RecordNotFoundException extends BaseException {
  constructor(
    entity: string,
    id: string | number,
    context: ExceptionContext = {},
    originalError?: Error,
  ) {
    super(
      `${entity} with ID '${id}' not found`,
      HttpStatus.NOT_FOUND,
      'NOT_FOUND_ERROR',
      {
        entity,
        id,
        ...context,
      },
      originalError,
    );
  }
}
