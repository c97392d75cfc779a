import { readFile, writeFile } from 'fs/promises';
import { play } from './interpreter';
import { exportMidi } from './exporters';
import type { MidiExportOptions } from './exporters';
import type { InterpreterOptions, SoundSink } from './types';

/**
 * Read PLAY text from disk
 * @param filePath - Path to a UTF-8 text file
 */
export async function readPlayFile(filePath: string): Promise<string> {
  return readFile(filePath, 'utf-8');
}

/**
 * Read a PLAY file and play it through a sink
 * @param filePath - Path to the file
 * @param sink - Output sink (default: no-op)
 * @param options - Initial interpreter state
 */
export async function playFile(
  filePath: string,
  sink?: SoundSink,
  options?: InterpreterOptions
): Promise<void> {
  const text = await readPlayFile(filePath);
  await play(text, sink, options);
}

/**
 * Render PLAY text to a Standard MIDI File on disk
 * @param text - PLAY text
 * @param filePath - Path to write the .mid file
 * @param options - Export options
 */
export async function exportMidiToFile(
  text: string,
  filePath: string,
  options: MidiExportOptions = {}
): Promise<void> {
  const data = exportMidi(text, options);
  await writeFile(filePath, data);
}
