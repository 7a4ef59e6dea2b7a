/**
 * relmapper - Error Types
 *
 * Every error raised by the mapper itself is a MapperError with a `code`
 * discriminant. Errors from the storage layer (driver exceptions) are never
 * wrapped and reach the caller as thrown by the driver.
 */

// ============================================
// Error Codes
// ============================================

export type MapperErrorCode =
  | 'RelationNotFound'
  | 'RelationNotFetched'
  | 'EntityFetcherMissing'
  | 'InvalidIncludePath'
  | 'NotFoundForCondition'
  | 'DeferredLookupFailed'
  | 'RecordNotFound'
  | 'QueryValidation'
  | 'TypeConversion'
  | 'InvalidConfiguration'
  | 'LimitExceeded';

export type ErrorDetails = Readonly<Record<string, string | number>>;

function formatDetails(details: ErrorDetails): string {
  return Object.entries(details)
    .map(([key, value]) => `${key}='${value}'`)
    .join(', ');
}

// ============================================
// Base Class
// ============================================

export class MapperError extends Error {
  readonly code: MapperErrorCode;
  readonly details: ErrorDetails;

  constructor(code: MapperErrorCode, details: ErrorDetails, options?: { cause?: unknown }) {
    const suffix = formatDetails(details);
    super(suffix ? `relmapper::${code}: ${suffix}` : `relmapper::${code}`, options);
    this.name = 'MapperError';
    this.code = code;
    this.details = details;
  }

  /**
   * Message suitable for an end user (no internal names).
   */
  userMessage(): string {
    switch (this.code) {
      case 'NotFoundForCondition':
      case 'RecordNotFound':
        return 'The requested record was not found.';
      case 'QueryValidation':
      case 'TypeConversion':
        return 'The request contained invalid data.';
      case 'LimitExceeded':
        return 'The request matched too many records.';
      default:
        return 'An internal error occurred.';
    }
  }

  /**
   * True when retrying with different input may succeed. Configuration and
   * include-path errors are programming mistakes and never recover.
   */
  isRecoverable(): boolean {
    return (
      this.code === 'NotFoundForCondition' ||
      this.code === 'DeferredLookupFailed' ||
      this.code === 'RecordNotFound' ||
      this.code === 'QueryValidation' ||
      this.code === 'TypeConversion' ||
      this.code === 'LimitExceeded'
    );
  }
}

export function isMapperError(error: unknown, code?: MapperErrorCode): error is MapperError {
  return error instanceof MapperError && (code === undefined || error.code === code);
}

// ============================================
// Constructors
// ============================================

export function relationNotFound(entity: string, relation: string): MapperError {
  return new MapperError('RelationNotFound', { entity, relation });
}

export function relationNotFetched(entity: string, relation: string): MapperError {
  return new MapperError('RelationNotFetched', { entity, relation });
}

export function entityFetcherMissing(entity: string): MapperError {
  return new MapperError('EntityFetcherMissing', { entity });
}

export function invalidIncludePath(path: string, reason: string): MapperError {
  return new MapperError('InvalidIncludePath', { path, reason });
}

export function notFoundForCondition(entity: string, condition: string): MapperError {
  return new MapperError('NotFoundForCondition', { entity, condition });
}

export function deferredLookupFailed(entity: string, relation: string, cause: unknown): MapperError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new MapperError('DeferredLookupFailed', { entity, relation, message }, { cause });
}

export function recordNotFound(entity: string, message: string): MapperError {
  return new MapperError('RecordNotFound', { entity, message });
}

export function queryValidation(message: string, entity?: string): MapperError {
  return new MapperError('QueryValidation', entity ? { entity, message } : { message });
}

export function typeConversion(field: string, expected: string, value: unknown): MapperError {
  return new MapperError('TypeConversion', { field, expected, value: String(value) });
}

export function invalidConfiguration(message: string): MapperError {
  return new MapperError('InvalidConfiguration', { message });
}

// ============================================
// Limit Errors
// ============================================

/**
 * Thrown when a find or an eager has-many fetch returns more rows than the
 * configured hard limit.
 */
export class LimitExceededError extends MapperError {
  readonly limit: number;
  readonly actual: number;
  readonly source: 'find' | 'relation';

  constructor(limit: number, actual: number, source: 'find' | 'relation', entity: string, relation?: string) {
    const details: Record<string, string | number> = { entity, source, limit, actual };
    if (relation) details.relation = relation;
    super('LimitExceeded', details);
    this.name = 'LimitExceededError';
    this.limit = limit;
    this.actual = actual;
    this.source = source;
  }
}
