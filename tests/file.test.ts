import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { readPlayFile, playFile, exportMidiToFile } from '../src/file';
import { exportMidi } from '../src/exporters';
import { createRecordingSink } from '../src/sinks';

const fixturesPath = join(__dirname, 'fixtures');

describe('File Operations', () => {
  let tempPath = '';

  beforeAll(() => {
    tempPath = mkdtempSync(join(tmpdir(), 'play-notation-'));
  });

  afterAll(() => {
    rmSync(tempPath, { recursive: true, force: true });
  });

  describe('readPlayFile', () => {
    it('should read PLAY text', async () => {
      const text = await readPlayFile(join(fixturesPath, 'scale.play'));
      expect(text.split('\n')[0]).toBe('T120 O3 MN L4');
    });
  });

  describe('playFile', () => {
    it('should play a file through a sink', async () => {
      const sink = createRecordingSink();
      await playFile(join(fixturesPath, 'scale.play'), sink);

      expect(sink.calls).toHaveLength(8);
      expect(sink.calls[7]).toEqual({ type: 'tone', frequency: 523, duration: 438 });
    });

    it('should reject with the first error and keep earlier events', async () => {
      const sink = createRecordingSink();

      await expect(playFile(join(fixturesPath, 'invalid-octave.play'), sink))
        .rejects.toMatchObject({ code: 'OCTAVE_OUT_OF_RANGE', index: 15 });
      expect(sink.calls).toHaveLength(3);
    });

    it('should pass interpreter options', async () => {
      const sink = createRecordingSink();
      await playFile(join(fixturesPath, 'scale.play'), sink, { articulation: 'legato' });

      // The file sets MN before any note
      expect(sink.calls[0]).toEqual({ type: 'tone', frequency: 262, duration: 438 });
    });
  });

  describe('exportMidiToFile', () => {
    it('should write a .mid file', async () => {
      const text = await readPlayFile(join(fixturesPath, 'scale.play'));
      const outputPath = join(tempPath, 'scale.mid');

      await exportMidiToFile(text, outputPath);

      expect(existsSync(outputPath)).toBe(true);
      const data = new Uint8Array(readFileSync(outputPath));
      expect(data).toEqual(exportMidi(text));
    });
  });
});
