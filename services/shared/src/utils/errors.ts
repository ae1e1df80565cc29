// Custom error classes for domain-specific errors

import type { UnitKind } from '../types/revenue.types';

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class UnitNotFoundError extends DomainError {
     constructor(public readonly unitId: number) {
          super(`Inventory unit ${unitId} not found`, 'UNIT_NOT_FOUND', 404);
     }
}

export class UnitKindMismatchError extends DomainError {
     constructor(
          public readonly unitId: number,
          public readonly expected: UnitKind,
          public readonly actual: UnitKind
     ) {
          super(
               `Inventory unit ${unitId} is a ${actual}, expected a ${expected}`,
               'UNIT_KIND_MISMATCH',
               400
          );
     }
}

export class InvalidConfigError extends DomainError {
     constructor(
          message: string,
          public readonly issues: string[] = []
     ) {
          super(message, 'INVALID_CONFIG', 400);
     }
}

export class InvalidUnitError extends DomainError {
     constructor(
          public readonly unitId: number,
          reason: string
     ) {
          super(`Inventory unit ${unitId} is unusable: ${reason}`, 'INVALID_UNIT', 422);
     }
}
