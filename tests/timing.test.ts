import { describe, it, expect } from 'vitest';
import {
  computeDuration,
  isAudible,
  pitchToFrequency,
  pitchToMidiNote,
  LETTER_PITCH,
} from '../src/timing';

describe('Pitch', () => {
  it('should tune pitch 49 to concert A', () => {
    expect(pitchToFrequency(49)).toBe(440);
  });

  it('should double the frequency every 12 pitches', () => {
    expect(pitchToFrequency(61)).toBe(880);
    expect(pitchToFrequency(37)).toBe(220);
  });

  it('should round to whole hertz', () => {
    expect(pitchToFrequency(40)).toBe(262); // 261.63
    expect(pitchToFrequency(41)).toBe(277); // 277.18
    expect(pitchToFrequency(6)).toBe(37); // 36.71
  });

  it('should treat pitches below 6 as silence', () => {
    expect(isAudible(0)).toBe(false);
    expect(isAudible(5)).toBe(false);
    expect(isAudible(6)).toBe(true);
  });

  it('should map pitch indices onto MIDI note numbers', () => {
    expect(pitchToMidiNote(49)).toBe(69);
    expect(pitchToMidiNote(40)).toBe(60);
  });

  it('should place letters on a chromatic scale starting at A', () => {
    expect(LETTER_PITCH).toEqual({ A: 1, B: 3, C: 4, D: 6, E: 8, F: 9, G: 11 });
  });
});

describe('Duration', () => {
  const normal = { tempo: 120, articulation: 'normal' as const };

  it('should compute a quarter note at 120 BPM with normal articulation', () => {
    expect(computeDuration(normal, 4)).toBe(438); // 437.5
  });

  it('should scale by note length', () => {
    expect(computeDuration(normal, 8)).toBe(219); // 218.75
    expect(computeDuration(normal, 2)).toBe(875);
    expect(computeDuration(normal, 1)).toBe(1750);
  });

  it('should apply dot multipliers', () => {
    expect(computeDuration(normal, 4, 1.5)).toBe(656); // 656.25
    expect(computeDuration(normal, 4, 1.75)).toBe(766); // 765.625
  });

  it('should apply articulation', () => {
    expect(computeDuration({ tempo: 120, articulation: 'staccato' }, 4)).toBe(375);
    expect(computeDuration({ tempo: 120, articulation: 'legato' }, 4)).toBe(500);
  });

  it('should follow tempo', () => {
    expect(computeDuration({ tempo: 32, articulation: 'normal' }, 4)).toBe(1641); // 1640.625
    expect(computeDuration({ tempo: 255, articulation: 'staccato' }, 64)).toBe(11);
  });
});
