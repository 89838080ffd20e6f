/**
 * Time error model. Arithmetic never throws; these cover raw values,
 * configuration and broken representation invariants.
 */

/** Optional metadata attached to time errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all time errors. Preserves prototype chain for instanceof. */
export class TimeError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A raw number or bigint does not fit the representation it was offered to. */
export class TimeValueError extends TimeError {}

/** An environment variable holds a value the backend selection cannot use. */
export class TimeConfigError extends TimeError {
  readonly variable: string;
  readonly value: string;

  constructor(message: string, variable: string, value: string) {
    super(message, { variable, value });
    this.variable = variable;
    this.value = value;
  }
}

/** A constructed value broke its own normalization rule. Indicates a bug. */
export class RepresentationError extends TimeError {}
