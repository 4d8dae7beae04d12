/**
 * Error types for mua-mime-codec
 */

/**
 * Error source categories
 */
export type ErrorSource = 'format' | 'validation' | 'input';

/**
 * Base codec error class
 */
export class MailCodecError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'MailCodecError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Format error (malformed address, header, date or boundary text)
 */
export class FormatError extends MailCodecError {
  override source: 'format' = 'format';
  /** Raw text that failed to parse */
  rawData: string;

  constructor(message: string, rawData: string) {
    super(message, 'FORMAT_ERROR', 'format');
    this.name = 'FormatError';
    this.rawData = rawData;
  }
}

/**
 * Validation error (missing essential header, empty required field,
 * illegal content-type/charset pairing)
 */
export class ValidationError extends MailCodecError {
  override source: 'validation' = 'validation';
  /** Field or structure that failed validation */
  field: string;

  constructor(message: string, field: string) {
    super(message, 'VALIDATION_ERROR', 'validation');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Required argument was null or undefined
 */
export class NullInputError extends MailCodecError {
  override source: 'input' = 'input';
  /** Name of the absent argument */
  argument: string;

  constructor(argument: string) {
    super(`Required argument "${argument}" is missing`, 'NULL_INPUT', 'input');
    this.name = 'NullInputError';
    this.argument = argument;
  }
}
