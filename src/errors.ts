/**
 * Error classes raised by the conversion pipeline.
 */

/** Base class for every error raised by md2notion. */
export class NotionizeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NotionizeError';
  }
}

/** Error thrown when the parser returns something other than a token tree. */
export class InvalidMarkdownError extends NotionizeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMarkdownError';
  }
}

/** Error thrown when no converter is registered for a token type. */
export class UnknownTokenError extends NotionizeError {
  public readonly tokenType: string;

  constructor(tokenType: string) {
    super(
      `Unknown token type: ${tokenType}. ` +
        'If you need to handle this token type, provide a custom converterFactory',
    );
    this.name = 'UnknownTokenError';
    this.tokenType = tokenType;
  }
}

/**
 * Error thrown when a converter fails. The original failure is kept as
 * `cause`.
 */
export class ConversionError extends NotionizeError {
  public readonly tokenType: string;

  constructor(tokenType: string, cause: unknown) {
    super(`Failed to convert token of type '${tokenType}'`, { cause });
    this.name = 'ConversionError';
    this.tokenType = tokenType;
  }
}
