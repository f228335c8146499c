export class ApplicantDataError extends Error {
  constructor(msg: string) {
    super(msg)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, ApplicantDataError.prototype)
  }
}

/**
 * Thrown for malformed paths and for path operations that make no sense for
 * the given path (e.g. the parent of the root path). Always a programming error.
 */
export class PathError extends ApplicantDataError {
  constructor(msg: string) {
    super(msg)
    Object.setPrototypeOf(this, PathError.prototype)
  }
}

/**
 * Thrown when raw typed input (a date, a number, a currency amount) cannot be parsed.
 */
export class ParseError extends ApplicantDataError {
  constructor(
    msg: string,
    readonly input: string
  ) {
    super(msg)
    Object.setPrototypeOf(this, ParseError.prototype)
  }
}

export class LockedError extends ApplicantDataError {
  constructor() {
    super("Cannot change ApplicantData after it has been locked.")
    Object.setPrototypeOf(this, LockedError.prototype)
  }
}

export function failure(message: string): never {
  throw new ApplicantDataError(message)
}
