// MIDI exporter
export { exportMidi } from './midi';
export type { MidiExportOptions } from './midi';
