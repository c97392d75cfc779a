import type { SoundSink, SyncSoundSink } from './types';

/** Sink that does nothing; the default when no device is attached */
export const nullSink: SyncSoundSink = {
  sound() {},
  pause() {},
};

export type RecordedCall =
  | { type: 'tone'; frequency: number; duration: number }
  | { type: 'silence'; duration: number };

export interface RecordingSink extends SyncSoundSink {
  readonly calls: RecordedCall[];
  clear(): void;
}

/**
 * Sink that records every call in order. Useful for tests and for hosts
 * that render the stream themselves after interpretation.
 */
export function createRecordingSink(): RecordingSink {
  const calls: RecordedCall[] = [];
  return {
    calls,
    sound(frequency, duration) {
      calls.push({ type: 'tone', frequency, duration });
    },
    pause(duration) {
      calls.push({ type: 'silence', duration });
    },
    clear() {
      calls.length = 0;
    },
  };
}

/**
 * Realtime sink options
 */
export interface RealtimeSinkOptions {
  /** Wait for the given number of milliseconds (default: a setTimeout timer) */
  wait?: (ms: number) => Promise<void>;
  /** Called with each event before waiting */
  onEvent?: (call: RecordedCall) => void;
}

const DEFAULT_REALTIME_OPTIONS: Required<Pick<RealtimeSinkOptions, 'wait'>> = {
  wait: (ms) => new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  }),
};

/**
 * Wrap a sink so each event blocks for its duration.
 * The inner sink is called first; for a device that plays asynchronously
 * the wait keeps the next event from starting early.
 */
export function createRealtimeSink(inner: SoundSink = nullSink, options: RealtimeSinkOptions = {}): SoundSink {
  const wait = options.wait ?? DEFAULT_REALTIME_OPTIONS.wait;
  const onEvent = options.onEvent;

  return {
    async sound(frequency, duration) {
      onEvent?.({ type: 'tone', frequency, duration });
      await inner.sound(frequency, duration);
      await wait(duration);
    },
    async pause(duration) {
      onEvent?.({ type: 'silence', duration });
      await inner.pause(duration);
      await wait(duration);
    },
  };
}
