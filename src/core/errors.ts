/**
 * Domain Errors
 *
 * Errors raised by the core modules and the services that wrap them. The API
 * error handler translates each class into an HTTP status; the CLI prints
 * the message. None of these carry HTTP concerns themselves.
 */

/**
 * A caller passed a value the core cannot work with: a confidence rating
 * outside 1-5, a question with an unusable correct-answer index, a
 * proficiency outside [0, 1]. Never corrected silently.
 */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * An internal invariant failed after computation. Indicates a bug, not bad
 * input, and is reported as a server error.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/** Lookup of an entity that does not exist (or is not visible to the learner). */
export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} with id '${id}' not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * A write lost a race: the stored row changed between read and write, or a
 * unique value is already taken.
 */
export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}
