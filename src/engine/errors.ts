/**
 * Error kinds raised by the frost-depth engine and its climate adapter.
 *
 * A degenerate freezing season is NOT an error: it is reported as a
 * `DegeneracyV1` annotation on a zero-depth result.
 */
export type FrostErrorKind = 'InvalidInput' | 'DomainError' | 'ClimateDataUnavailable';

export class FrostModelError extends Error {
  readonly kind: FrostErrorKind;
  /** The input field or derived quantity that caused the failure. */
  readonly quantity: string;

  constructor(kind: FrostErrorKind, quantity: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.quantity = quantity;
  }
}

export interface InputIssue {
  field: string;
  message: string;
}

/** A raw input violates its physical-plausibility invariant. */
export class InvalidInputError extends FrostModelError {
  readonly value: unknown;
  readonly issues: InputIssue[];

  constructor(field: string, message: string, value: unknown, issues: InputIssue[]) {
    super('InvalidInput', field, message);
    this.value = value;
    this.issues = issues;
  }
}

/** A derived parameter left the range where the closed-form solution exists. */
export class DomainError extends FrostModelError {
  /** Derived values involved, keyed by quantity name. */
  readonly values: Readonly<Record<string, number>>;

  constructor(quantity: string, message: string, values: Record<string, number>) {
    super('DomainError', quantity, message);
    this.values = values;
  }
}

/** The SNAP Data API could not supply the requested climate value. */
export class ClimateDataUnavailableError extends FrostModelError {
  readonly status?: number;

  constructor(quantity: string, message: string, status?: number) {
    super('ClimateDataUnavailable', quantity, message);
    this.status = status;
  }
}
