/**
 * PLAY token rules.
 *
 * Each rule is entered with the cursor on the token's leading character and
 * leaves it on the last character it consumed. Directives update the
 * interpreter state in place; notes and pauses return a ResolvedNote for the
 * interpreter to render.
 *
 *   O<0-6>         set octave          <  >   step octave
 *   A-G[+#-][len][.]  note             N<0-84>[.]   note by number
 *   P<len>[.]      pause               L<1-64>      default length
 *   T<32-255>      tempo               M<B|F|L|N|S> mode / articulation
 */

import { Cursor, digitValue, isDigit } from './cursor';
import type { InterpreterState } from './types';
import { LETTER_PITCH, NOTE_NUMBER_OFFSET, PAUSE } from './timing';

// ============================================================
// Types
// ============================================================

export interface ResolvedNote {
  /** Pitch index; below 6 renders as silence */
  pitch: number;
  /** Effective note length for this note only */
  noteLength: number;
  /** Number of dots (0-2) */
  dots: number;
  /** Index of the leading character */
  position: number;
}

const MAX_OCTAVE = 6;
const MAX_NOTE_LENGTH = 64;
const MAX_NOTE_NUMBER = 84;
const MIN_TEMPO = 32;
const MAX_TEMPO = 255;
const MAX_DOTS = 2;

const WHITESPACE = new Set(['\t', '\n', '\v', '\f', '\r', ' ']);

// ============================================================
// Dispatch
// ============================================================

/**
 * Scan one token starting at the cursor.
 * Returns the note to render, or undefined for directives and whitespace.
 */
export function scanToken(cursor: Cursor, state: InterpreterState): ResolvedNote | undefined {
  const ch = cursor.current();

  if (WHITESPACE.has(ch)) {
    return undefined;
  }

  switch (ch) {
    case 'O':
      state.octave = parseOctave(cursor);
      return undefined;

    case '<':
      if (state.octave <= 0) {
        throw cursor.error('OCTAVE_OUT_OF_RANGE');
      }
      state.octave--;
      return undefined;

    case '>':
      if (state.octave >= MAX_OCTAVE) {
        throw cursor.error('OCTAVE_OUT_OF_RANGE');
      }
      state.octave++;
      return undefined;

    case 'A':
    case 'B':
    case 'C':
    case 'D':
    case 'E':
    case 'F':
    case 'G':
      return parseNoteLetter(cursor, state, ch);

    case 'N': {
      const position = cursor.index;
      const pitch = parseNoteNumber(cursor) + NOTE_NUMBER_OFFSET;
      const dots = parseDots(cursor);
      return { pitch, noteLength: state.noteLength, dots, position };
    }

    case 'P': {
      const position = cursor.index;
      const noteLength = parseNoteLength(cursor);
      const dots = parseDots(cursor);
      return { pitch: PAUSE, noteLength, dots, position };
    }

    case 'L':
      state.noteLength = parseNoteLength(cursor);
      return undefined;

    case 'T':
      state.tempo = parseTempo(cursor);
      return undefined;

    case 'M':
      parseMode(cursor, state);
      return undefined;

    default:
      throw cursor.error('UNEXPECTED_CHARACTER');
  }
}

// ============================================================
// Token Rules
// ============================================================

function parseOctave(cursor: Cursor): number {
  const value = digitValue(cursor.advance());
  if (value === undefined || value > MAX_OCTAVE) {
    throw cursor.error('OCTAVE_OUT_OF_RANGE');
  }
  return value;
}

function parseNoteLetter(cursor: Cursor, state: InterpreterState, letter: string): ResolvedNote {
  const position = cursor.index;
  let pitch = state.octave * 12 + LETTER_PITCH[letter];

  // B-C and E-F are adjacent semitones: B#, E#, Cb and Fb keep the natural pitch
  const modifier = cursor.peekNext();
  if (modifier === '+' || modifier === '#') {
    if (letter !== 'B' && letter !== 'E') {
      pitch++;
    }
    cursor.skip();
  } else if (modifier === '-') {
    if (letter !== 'C' && letter !== 'F') {
      pitch--;
    }
    cursor.skip();
  }

  const noteLength = isDigit(cursor.peekNext()) ? parseNoteLength(cursor) : state.noteLength;
  const dots = parseDots(cursor);

  return { pitch, noteLength, dots, position };
}

function parseMode(cursor: Cursor, state: InterpreterState): void {
  switch (cursor.advance()) {
    case 'B':
    case 'F':
      // Background and foreground playback are accepted and ignored
      break;
    case 'L':
      state.articulation = 'legato';
      break;
    case 'N':
      state.articulation = 'normal';
      break;
    case 'S':
      state.articulation = 'staccato';
      break;
    default:
      throw cursor.error('UNEXPECTED_CHARACTER');
  }
}

function parseTempo(cursor: Cursor): number {
  const first = digitValue(cursor.advance());
  const second = digitValue(cursor.peekNext());

  if (first === undefined || first < 1 || second === undefined) {
    throw cursor.error('TEMPO_OUT_OF_RANGE');
  }
  cursor.skip();
  let value = first * 10 + second;

  const third = digitValue(cursor.peekNext());
  if (third !== undefined) {
    cursor.skip();
    value = value * 10 + third;
  }

  if (value < MIN_TEMPO || value > MAX_TEMPO) {
    throw cursor.error('TEMPO_OUT_OF_RANGE');
  }
  return value;
}

// ============================================================
// Shared Sub-Rules
// ============================================================

/** One or two digits, 1-64; the first digit must not be 0 */
export function parseNoteLength(cursor: Cursor): number {
  let value = digitValue(cursor.advance());
  if (value === undefined || value < 1) {
    throw cursor.error('NOTE_LENGTH_OUT_OF_RANGE');
  }

  const second = digitValue(cursor.peekNext());
  if (second !== undefined) {
    cursor.skip();
    value = value * 10 + second;
  }

  if (value > MAX_NOTE_LENGTH) {
    throw cursor.error('NOTE_LENGTH_OUT_OF_RANGE');
  }
  return value;
}

/** One or two digits, 0-84 */
export function parseNoteNumber(cursor: Cursor): number {
  let value = digitValue(cursor.advance());
  if (value === undefined) {
    throw cursor.error('NOTE_NUMBER_OUT_OF_RANGE');
  }

  const second = digitValue(cursor.peekNext());
  if (second !== undefined) {
    cursor.skip();
    value = value * 10 + second;
  }

  if (value > MAX_NOTE_NUMBER) {
    throw cursor.error('NOTE_NUMBER_OUT_OF_RANGE');
  }
  return value;
}

/** Count trailing dots; a third dot is an error */
export function parseDots(cursor: Cursor): number {
  let dots = 0;
  while (cursor.peekNext() === '.') {
    cursor.skip();
    dots++;
    if (dots > MAX_DOTS) {
      throw cursor.error('INVALID_DOTTED_COUNT');
    }
  }
  return dots;
}
