// ============================================================
// Error Types
// ============================================================

export type PlayErrorCode =
  // Scanning
  | 'UNEXPECTED_END_OF_INPUT'
  | 'UNEXPECTED_CHARACTER'
  // Ranges
  | 'OCTAVE_OUT_OF_RANGE'
  | 'NOTE_LENGTH_OUT_OF_RANGE'
  | 'NOTE_NUMBER_OUT_OF_RANGE'
  | 'TEMPO_OUT_OF_RANGE'
  // Modifiers
  | 'INVALID_DOTTED_COUNT';

const DETAILS: Record<PlayErrorCode, string> = {
  UNEXPECTED_END_OF_INPUT: 'The text ended in the middle of a token.',
  UNEXPECTED_CHARACTER: 'Unexpected character.',
  OCTAVE_OUT_OF_RANGE: 'Octave must be between 0 and 6 (inclusive).',
  NOTE_LENGTH_OUT_OF_RANGE: 'Note length must be between 1 and 64 (inclusive).',
  NOTE_NUMBER_OUT_OF_RANGE: 'Note must be between 0 and 84 (inclusive).',
  TEMPO_OUT_OF_RANGE: 'Tempo must be between 32 and 255 (inclusive).',
  INVALID_DOTTED_COUNT: 'The dotted count must be between 0 and 2 (inclusive).',
};

/**
 * Raised on the first malformed token. `index` is the position of the
 * offending character in the input; `character` is that character as
 * written, or undefined when the input ended early.
 */
export class PlayError extends Error {
  constructor(
    public readonly code: PlayErrorCode,
    public readonly index: number,
    public readonly character: string | undefined,
    detail: string = DETAILS[code]
  ) {
    super(
      character === undefined
        ? `Unexpected end of input at ${index}. ${detail}`
        : `Invalid token at ${index}: '${character}'. ${detail}`
    );
    this.name = 'PlayError';
  }
}

export function isPlayError(error: unknown): error is PlayError {
  return error instanceof PlayError;
}

/**
 * Render an error with the offending line and a caret under its column.
 *
 * @example
 * formatPlayError(err, 'T120\nO9 C')
 * // line 2, column 2: Invalid token at 6: '9'. Octave must be ...
 * //   O9 C
 * //    ^
 */
export function formatPlayError(error: PlayError, text: string): string {
  const { line, column } = getLineColumn(text, error.index);
  const lineStart = error.index - (column - 1);
  const lineEndIndex = text.indexOf('\n', error.index);
  const lineEnd = lineEndIndex === -1 ? text.length : lineEndIndex;

  return [
    `line ${line}, column ${column}: ${error.message}`,
    `  ${text.slice(lineStart, lineEnd)}`,
    `  ${' '.repeat(column - 1)}^`,
  ].join('\n');
}

/**
 * 1-based line and column of an index in the text
 */
export function getLineColumn(text: string, index: number): { line: number; column: number } {
  const lines = text.slice(0, index).split('\n');
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}
