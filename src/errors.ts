export class KarmaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised by the parser for text it cannot take a subject from. */
export class InvalidInputError extends KarmaError {}

/**
 * The ledger file exists but cannot be trusted. Karma is never reset over one of these.
 */
export class KarmaFileError extends KarmaError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${filePath})`, options);
    this.filePath = filePath;
  }
}
