import { QueryFailedError } from 'typeorm';
import { BaseException } from '../exceptions/base.exception';
import { RecordConflictException } from '../exceptions/record-conflict.exception';
import { RecordNotFoundException } from '../exceptions/record-not-found.exception';

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres unique_violation
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

const FOREIGN_KEY_VIOLATION_CODES = new Set([
  '23503', // postgres foreign_key_violation
  'SQLITE_CONSTRAINT_FOREIGNKEY',
]);

export interface StoreErrorContext {
  entity: string;
  key: Record<string, unknown>;
}

/**
 * Extract the driver error code from a failed query
 */
export function driverErrorCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) {
    return undefined;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
}

/**
 * Translate unique-key and foreign-key violations raised by the store into domain exceptions.
 * Anything else is returned untouched for the caller to rethrow.
 */
export function translateStoreError(error: unknown, context: StoreErrorContext): unknown {
  if (error instanceof BaseException) {
    return error;
  }

  const code = driverErrorCode(error);
  const originalError = error instanceof Error ? error : undefined;

  if (code && UNIQUE_VIOLATION_CODES.has(code)) {
    return new RecordConflictException(
      `${context.entity} already exists`,
      { entity: context.entity, ...context.key },
      originalError,
    );
  }

  if (code && FOREIGN_KEY_VIOLATION_CODES.has(code)) {
    return new RecordNotFoundException(
      'Referenced record',
      Object.values(context.key).join('/'),
      { entity: context.entity, ...context.key },
      originalError,
    );
  }

  return error;
}

/**
 * Run a store write, translating key violations into domain exceptions
 */
export async function withStoreErrors<T>(context: StoreErrorContext, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw translateStoreError(error, context);
  }
}
