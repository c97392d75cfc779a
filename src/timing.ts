import type { Articulation, InterpreterState } from './types';

// Pitch constants
export const PAUSE = 0;
/** Lowest pitch index that renders as a tone; anything below is silence */
export const LOWEST_AUDIBLE_PITCH = 6;
export const CONCERT_A_PITCH = 49;
export const CONCERT_A_FREQUENCY = 440;

/** Added to `N` note numbers to reach the pitch index space */
export const NOTE_NUMBER_OFFSET = 5;

/** Pitch index of each letter within octave 0, A through G */
export const LETTER_PITCH: Record<string, number> = {
  'A': 1, 'B': 3, 'C': 4, 'D': 6, 'E': 8, 'F': 9, 'G': 11,
};

export const ARTICULATION_RATIO: Record<Articulation, number> = {
  staccato: 3 / 4,
  normal: 7 / 8,
  legato: 1,
};

/** Duration multiplier for 0, 1 or 2 dots */
export const DOT_MULTIPLIER = [1, 1.5, 1.75] as const;

/**
 * Equal-temperament frequency of a pitch index, in whole hertz.
 * Index 49 is 440 Hz; each 12 indices double it.
 */
export function pitchToFrequency(pitch: number): number {
  return Math.round(CONCERT_A_FREQUENCY * Math.pow(2, (pitch - CONCERT_A_PITCH) / 12));
}

/** MIDI note number of a pitch index (index 49 = MIDI 69) */
export function pitchToMidiNote(pitch: number): number {
  return pitch + 20;
}

export function isAudible(pitch: number): boolean {
  return pitch >= LOWEST_AUDIBLE_PITCH;
}

/**
 * Duration of one note in whole milliseconds.
 * Rounded once, after every factor is applied.
 */
export function computeDuration(
  state: Pick<InterpreterState, 'tempo' | 'articulation'>,
  noteLength: number,
  dotMultiplier: number = 1
): number {
  let value = (60 / state.tempo) * 1000; // ms per quarter note
  value *= 4 / noteLength;
  value *= dotMultiplier;
  value *= ARTICULATION_RATIO[state.articulation];
  return Math.round(value);
}
