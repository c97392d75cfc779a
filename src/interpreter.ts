import { Cursor } from './cursor';
import { scanToken } from './rules';
import type { ResolvedNote } from './rules';
import { ARTICULATION_RATIO, computeDuration, DOT_MULTIPLIER, isAudible, pitchToFrequency } from './timing';
import type {
  InterpreterOptions,
  InterpreterState,
  PlayEvent,
  SoundSink,
  SyncSoundSink,
} from './types';
import { nullSink } from './sinks';

export const DEFAULT_STATE: Readonly<InterpreterState> = {
  octave: 3,
  tempo: 120,
  noteLength: 4,
  articulation: 'normal',
};

// ============================================================
// State
// ============================================================

/**
 * Create a fresh interpreter state from the defaults and any overrides.
 * Overrides outside the ranges the notation itself accepts are rejected.
 */
export function createState(options: InterpreterOptions = {}): InterpreterState {
  const state: InterpreterState = {
    octave: options.octave ?? DEFAULT_STATE.octave,
    tempo: options.tempo ?? DEFAULT_STATE.tempo,
    noteLength: options.noteLength ?? DEFAULT_STATE.noteLength,
    articulation: options.articulation ?? DEFAULT_STATE.articulation,
  };

  checkRange('octave', state.octave, 0, 6);
  checkRange('tempo', state.tempo, 32, 255);
  checkRange('noteLength', state.noteLength, 1, 64);
  if (!(state.articulation in ARTICULATION_RATIO)) {
    throw new RangeError(`articulation must be staccato, normal or legato, got ${state.articulation}`);
  }

  return state;
}

function checkRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${field} must be an integer between ${min} and ${max} (inclusive), got ${value}`);
  }
}

function renderNote(note: ResolvedNote, state: InterpreterState): PlayEvent {
  const duration = computeDuration(state, note.noteLength, DOT_MULTIPLIER[note.dots]);

  if (!isAudible(note.pitch)) {
    return { type: 'silence', duration, position: note.position };
  }
  return {
    type: 'tone',
    frequency: pitchToFrequency(note.pitch),
    duration,
    pitch: note.pitch,
    position: note.position,
  };
}

// ============================================================
// Public API
// ============================================================

/**
 * Scan PLAY text and yield each event as soon as its token is complete.
 *
 * Nothing past the current token is read before the event is yielded, so a
 * malformed token only surfaces (as a PlayError) once every earlier event
 * has been consumed.
 */
export function* events(text: string, options: InterpreterOptions = {}): Generator<PlayEvent, void, undefined> {
  const state = createState(options);
  const cursor = new Cursor(text);

  while (!cursor.done) {
    const note = scanToken(cursor, state);
    cursor.skip();
    if (note) {
      yield renderNote(note, state);
    }
  }
}

function dispatch(sink: SoundSink, event: PlayEvent): void | Promise<void> {
  return event.type === 'tone'
    ? sink.sound(event.frequency, event.duration)
    : sink.pause(event.duration);
}

/**
 * Interpret PLAY text, calling the sink once per event.
 * Sinks that return a promise must be driven with {@link play} instead.
 * @throws {PlayError} on the first malformed token
 * @throws {TypeError} if the sink returns a promise
 */
export function interpret(text: string, sink: SyncSoundSink = nullSink, options?: InterpreterOptions): void {
  for (const event of events(text, options)) {
    const result = dispatch(sink, event);
    if (result instanceof Promise) {
      // The caller never sees this promise; report its rejection here
      void result.catch((error: unknown) => {
        console.error('Asynchronous sink passed to interpret() failed:', error);
      });
      throw new TypeError(`Sink returned a promise for the event at ${event.position}; use play() for asynchronous sinks`);
    }
  }
}

/**
 * Interpret PLAY text, awaiting the sink after each event before scanning
 * the next token. With a sink that resolves after the event's duration,
 * this renders the music in real time.
 * @throws {PlayError} on the first malformed token
 */
export async function play(text: string, sink: SoundSink = nullSink, options?: InterpreterOptions): Promise<void> {
  for (const event of events(text, options)) {
    await dispatch(sink, event);
  }
}

/**
 * Interpret PLAY text and return every event
 */
export function collectEvents(text: string, options?: InterpreterOptions): PlayEvent[] {
  return Array.from(events(text, options));
}

/**
 * Total duration in milliseconds of every event in the text
 */
export function getTotalDuration(text: string, options?: InterpreterOptions): number {
  let total = 0;
  for (const event of events(text, options)) {
    total += event.duration;
  }
  return total;
}
