import { events } from '../interpreter';
import { getLineColumn, isPlayError } from '../errors';
import type { PlayError, PlayErrorCode } from '../errors';
import type { InterpreterOptions } from '../types';

// ============================================================
// Validation Types
// ============================================================

export interface ValidationError {
  code: PlayErrorCode;
  message: string;
  /** Index of the offending character */
  index: number;
  /** 1-based line and column of `index` */
  line: number;
  column: number;
  character?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  /** Events rendered before the first error (all of them when valid) */
  eventCount: number;
  /** Duration in ms of those events */
  duration: number;
}

// ============================================================
// Main Validate Function
// ============================================================

/**
 * Validate PLAY text without playing it.
 *
 * Interpretation stops at the first malformed token, so `errors` holds at
 * most one entry.
 */
export function validate(text: string, options: InterpreterOptions = {}): ValidationResult {
  let eventCount = 0;
  let duration = 0;

  try {
    for (const event of events(text, options)) {
      eventCount++;
      duration += event.duration;
    }
  } catch (error) {
    if (!isPlayError(error)) {
      throw error;
    }
    return { valid: false, errors: [toValidationError(error, text)], eventCount, duration };
  }

  return { valid: true, errors: [], eventCount, duration };
}

function toValidationError(error: PlayError, text: string): ValidationError {
  const { line, column } = getLineColumn(text, error.index);
  const result: ValidationError = {
    code: error.code,
    message: error.message,
    index: error.index,
    line,
    column,
  };
  if (error.character !== undefined) {
    result.character = error.character;
  }
  return result;
}

// ============================================================
// Convenience Functions
// ============================================================

/**
 * Check if PLAY text is valid (no errors)
 */
export function isValid(text: string, options?: InterpreterOptions): boolean {
  return validate(text, options).valid;
}

/**
 * Validate and throw if invalid
 */
export function assertValid(text: string, options?: InterpreterOptions): void {
  const result = validate(text, options);
  if (!result.valid) {
    const errorMessages = result.errors.map(e =>
      `[${e.code}] ${e.message} at line ${e.line}, column ${e.column}`
    ).join('\n');
    throw new ValidationException(result.errors, errorMessages);
  }
}

/**
 * Exception thrown by assertValid
 */
export class ValidationException extends Error {
  constructor(
    public readonly errors: ValidationError[],
    message: string
  ) {
    super(message);
    this.name = 'ValidationException';
  }
}
