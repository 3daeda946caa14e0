import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';

/** Malformed or out-of-range input, rejected before any transaction opens. */
export class InvalidTeachingInputException extends BadRequestException {}

/** Unknown course instance, activity, employee or salary history. */
export class TeachingNotFoundException extends NotFoundException {}

export type AllocationRule =
  | 'ALLOCATION_LIMIT'
  | 'DUPLICATE_ALLOCATION'
  | 'DERIVED_ACTIVITY'
  | 'DUPLICATE_ACTIVITY_NAME';

export type AllocationRejectionDetails = Record<string, string | number | boolean>;

/**
 * A business rule said no. The response body names the rule and the values
 * that broke it, e.g. `{ rule: 'ALLOCATION_LIMIT', limit: 4, activeInstances: 4 }`.
 */
export class AllocationRejectedException extends ConflictException {
  constructor(
    readonly rule: AllocationRule,
    message: string,
    readonly details: AllocationRejectionDetails = {},
  ) {
    super({ statusCode: 409, error: 'Conflict', message, rule, ...details });
  }
}

/**
 * Anything the database threw that is not a rule decision: lost connection,
 * lock wait timeout, constraint violation at commit.
 */
export class TeachingStoreException extends InternalServerErrorException {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Teaching database failure during ${operation}.`, { cause });
  }
}
