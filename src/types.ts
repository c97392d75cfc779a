// ============================================================
// Interpreter State
// ============================================================

export type Articulation = 'staccato' | 'normal' | 'legato';

/**
 * Mutable state carried across tokens during one interpretation.
 * Directive tokens replace fields in place; note and pause tokens
 * may override `noteLength` for a single event only.
 */
export interface InterpreterState {
  /** Current octave (0-6) */
  octave: number;
  /** Quarter notes per minute (32-255) */
  tempo: number;
  /** Default note length as the denominator of a whole note (1-64) */
  noteLength: number;
  articulation: Articulation;
}

/**
 * Initial state overrides. Every field falls back to the PLAY defaults:
 * octave 3, tempo 120, note length 4, normal articulation.
 */
export interface InterpreterOptions {
  octave?: number;
  tempo?: number;
  noteLength?: number;
  articulation?: Articulation;
}

// ============================================================
// Events
// ============================================================

export interface ToneEvent {
  type: 'tone';
  /** Frequency in hertz, rounded */
  frequency: number;
  /** Duration in milliseconds, rounded */
  duration: number;
  /** Absolute pitch index (49 = A 440) */
  pitch: number;
  /** Index of the token's leading character in the input */
  position: number;
}

export interface SilenceEvent {
  type: 'silence';
  duration: number;
  position: number;
}

export type PlayEvent = ToneEvent | SilenceEvent;

// ============================================================
// Output
// ============================================================

/**
 * Effect boundary of the interpreter. Called once per event, in order.
 * A sink that returns a promise is awaited by `play()` before the next
 * token is scanned.
 */
export interface SoundSink {
  sound(frequency: number, duration: number): void | Promise<void>;
  pause(duration: number): void | Promise<void>;
}

/** A sink whose calls complete synchronously, usable with `interpret()` */
export interface SyncSoundSink extends SoundSink {
  sound(frequency: number, duration: number): void;
  pause(duration: number): void;
}
