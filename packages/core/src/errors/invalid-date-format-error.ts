/**
 * Raised when a header value matches none of the HTTP-date grammars.
 */
export class InvalidDateFormatError extends Error {
  /** The header value exactly as it was passed to the parser. */
  public readonly input: string;

  constructor(input: string) {
    super(`Invalid date format: ${JSON.stringify(input)}`);
    this.name = 'InvalidDateFormatError';
    this.input = input;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
