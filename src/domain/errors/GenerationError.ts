export type GenerationErrorKind = 'validation' | 'persistence' | 'internal';

/**
 * Base class for failures surfaced by package generation
 */
export abstract class GenerationError extends Error {
  abstract readonly kind: GenerationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  /** Dotted path of the offending field, e.g. `zones.1.priority` */
  field: string;
  reason: string;
}

/**
 * Malformed or contradictory input. Nothing is written.
 * `field`/`reason` describe the first violation; `issues` lists all of them.
 */
export class ValidationError extends GenerationError {
  readonly kind = 'validation';
  readonly field: string;
  readonly reason: string;

  constructor(readonly issues: ValidationIssue[]) {
    const [first] = issues;
    const field = first?.field ?? '';
    const reason = first?.reason ?? 'Invalid input';
    super(field ? `${field}: ${reason}` : reason);
    this.field = field;
    this.reason = reason;
  }

  static single(field: string, reason: string): ValidationError {
    return new ValidationError([{ field, reason }]);
  }
}

/**
 * The destination could not be written. The previous document is left in place.
 */
export class PersistenceError extends GenerationError {
  readonly kind = 'persistence';

  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A state that validated input should never produce
 */
export class InternalInvariantError extends GenerationError {
  readonly kind = 'internal';
}
