import type { ViolationCode } from './validate.js';

/**
 * Raised by the strict entry point when the input is not a decimal literal.
 * `index` is the code-point position of the offending character, when there is one.
 */
export class DecimalParseError extends Error {
  constructor(
    message: string,
    public readonly code: ViolationCode,
    public readonly input: string,
    public readonly index?: number
  ) {
    super(message);
    this.name = 'DecimalParseError';
  }
}

/**
 * A non-digit reached the packer. Only a validator defect can cause this.
 */
export class DecimalInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecimalInvariantError';
  }
}
