// Core types
export type {
  Articulation,
  InterpreterState,
  InterpreterOptions,
  ToneEvent,
  SilenceEvent,
  PlayEvent,
  SoundSink,
  SyncSoundSink,
} from './types';

// Interpreter
export {
  events,
  interpret,
  play,
  collectEvents,
  getTotalDuration,
  createState,
  DEFAULT_STATE,
} from './interpreter';

// Errors
export { PlayError, isPlayError, formatPlayError, getLineColumn } from './errors';
export type { PlayErrorCode } from './errors';

// Pitch and duration
export {
  pitchToFrequency,
  pitchToMidiNote,
  computeDuration,
  isAudible,
  PAUSE,
  ARTICULATION_RATIO,
} from './timing';

// Sinks
export { nullSink, createRecordingSink, createRealtimeSink } from './sinks';
export type { RecordedCall, RecordingSink, RealtimeSinkOptions } from './sinks';

// Exporters
export { exportMidi } from './exporters';
export type { MidiExportOptions } from './exporters';

// File I/O
export { readPlayFile, playFile, exportMidiToFile } from './file';

// Validation
export {
  validate,
  isValid,
  assertValid,
  ValidationException,
} from './validator';
export type { ValidationError, ValidationResult } from './validator';
