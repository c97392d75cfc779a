import { events } from '../interpreter';
import { pitchToMidiNote } from '../timing';
import type { InterpreterOptions } from '../types';

/**
 * MIDI export options
 */
export interface MidiExportOptions extends InterpreterOptions {
  /** Ticks per quarter note (default: 500, one tick per millisecond) */
  ticksPerQuarterNote?: number;
  /** MIDI channel, 0-15 (default: 0) */
  channel?: number;
  /** General MIDI program, 1-128 (default: 1) */
  program?: number;
  /** Velocity for notes (default: 80) */
  velocity?: number;
}

/**
 * The file is written at a fixed 120 BPM so ticks map linearly onto the
 * millisecond timeline the interpreter produces.
 */
const FILE_TEMPO = 120;
const MS_PER_QUARTER_NOTE = 60000 / FILE_TEMPO;

/**
 * Export PLAY text to Standard MIDI File format (SMF Type 1)
 * @param text - PLAY text
 * @param options - Export and interpreter options
 * @returns The MIDI file data as Uint8Array
 * @throws {PlayError} if the text is malformed
 */
export function exportMidi(text: string, options: MidiExportOptions = {}): Uint8Array {
  const ticksPerQuarterNote = options.ticksPerQuarterNote ?? 500;
  const channel = options.channel ?? 0;
  const program = options.program ?? 1;
  const velocity = options.velocity ?? 80;

  const tracks: Uint8Array[] = [
    createConductorTrack(),
    createNoteTrack(text, options, channel, program, ticksPerQuarterNote, velocity),
  ];

  return buildMidiFile(tracks, ticksPerQuarterNote);
}

/**
 * Create conductor track (tempo only)
 */
function createConductorTrack(): Uint8Array {
  const microsecondsPerQuarterNote = Math.round(60000000 / FILE_TEMPO);
  const bytes: number[] = [
    ...writeVariableLength(0), // Delta time
    0xff, 0x51, 0x03, // Tempo meta event
    (microsecondsPerQuarterNote >> 16) & 0xff,
    (microsecondsPerQuarterNote >> 8) & 0xff,
    microsecondsPerQuarterNote & 0xff,
  ];

  // End of track
  bytes.push(...writeVariableLength(0), 0xff, 0x2f, 0x00);

  return new Uint8Array(bytes);
}

/**
 * Create the note track from the interpreted event stream.
 * Events never overlap, so note on/off pairs are written in scan order.
 */
function createNoteTrack(
  text: string,
  options: InterpreterOptions,
  channel: number,
  program: number,
  ticksPerQuarterNote: number,
  velocity: number
): Uint8Array {
  const bytes: number[] = [];
  const toTick = (ms: number) => Math.round((ms * ticksPerQuarterNote) / MS_PER_QUARTER_NOTE);

  // Program change
  bytes.push(
    ...writeVariableLength(0),
    0xc0 | (channel & 0x0f),
    (program - 1) & 0x7f // MIDI programs are 0-indexed
  );

  // Elapsed time is kept in ms and converted per event to avoid drift
  let elapsedMs = 0;
  let lastTick = 0;

  for (const event of events(text, options)) {
    const startTick = toTick(elapsedMs);
    elapsedMs += event.duration;

    if (event.type !== 'tone') {
      continue;
    }

    const endTick = toTick(elapsedMs);
    const note = pitchToMidiNote(event.pitch) & 0x7f;

    bytes.push(
      ...writeVariableLength(startTick - lastTick),
      0x90 | (channel & 0x0f),
      note,
      velocity & 0x7f
    );
    bytes.push(
      ...writeVariableLength(endTick - startTick),
      0x80 | (channel & 0x0f),
      note,
      0
    );
    lastTick = endTick;
  }

  // End of track, after any trailing silence
  bytes.push(...writeVariableLength(toTick(elapsedMs) - lastTick), 0xff, 0x2f, 0x00);

  return new Uint8Array(bytes);
}

/**
 * Write a variable-length quantity
 */
export function writeVariableLength(value: number): number[] {
  if (value < 0) value = 0;

  const bytes: number[] = [];
  bytes.unshift(value & 0x7f);
  value >>= 7;

  while (value > 0) {
    bytes.unshift((value & 0x7f) | 0x80);
    value >>= 7;
  }

  return bytes;
}

/**
 * Write a 32-bit big-endian integer
 */
function writeUint32BE(value: number): number[] {
  return [
    (value >> 24) & 0xff,
    (value >> 16) & 0xff,
    (value >> 8) & 0xff,
    value & 0xff,
  ];
}

/**
 * Write a 16-bit big-endian integer
 */
function writeUint16BE(value: number): number[] {
  return [
    (value >> 8) & 0xff,
    value & 0xff,
  ];
}

/**
 * Build the complete MIDI file
 */
function buildMidiFile(tracks: Uint8Array[], ticksPerQuarterNote: number): Uint8Array {
  const chunks: number[] = [];

  // Header chunk
  chunks.push(
    0x4d, 0x54, 0x68, 0x64, // "MThd"
    ...writeUint32BE(6),
    ...writeUint16BE(1), // Type 1 MIDI file
    ...writeUint16BE(tracks.length),
    ...writeUint16BE(ticksPerQuarterNote)
  );

  // Track chunks
  for (const track of tracks) {
    chunks.push(
      0x4d, 0x54, 0x72, 0x6b, // "MTrk"
      ...writeUint32BE(track.length),
      ...Array.from(track)
    );
  }

  return new Uint8Array(chunks);
}
