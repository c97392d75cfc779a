#!/usr/bin/env tsx
/**
 * PLAY text player and MIDI converter
 *
 * Usage:
 *   npx tsx scripts/play.ts <input.play> [--midi output.mid] [--realtime]
 *   npx tsx scripts/play.ts -e "T120 O3 L4 CDEFG" [--midi output.mid]
 *
 * Without --realtime the events are printed as fast as they are scanned.
 * With --realtime each event is printed and then waited out.
 */

import { readPlayFile, exportMidiToFile } from '../src/file';
import { collectEvents, play } from '../src/interpreter';
import { createRealtimeSink } from '../src/sinks';
import { formatPlayError, isPlayError } from '../src/errors';
import type { RecordedCall } from '../src/sinks';

interface CliArgs {
  input?: string;
  expression?: string;
  midiPath?: string;
  realtime: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { realtime: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-e') {
      args.expression = argv[++i];
    } else if (arg === '--midi') {
      args.midiPath = argv[++i];
    } else if (arg === '--realtime') {
      args.realtime = true;
    } else {
      args.input = arg;
    }
  }
  return args;
}

function formatCall(call: RecordedCall): string {
  return call.type === 'tone'
    ? `tone    ${String(call.frequency).padStart(5)} Hz  ${call.duration} ms`
    : `silence           ${call.duration} ms`;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (!args.input && args.expression === undefined) {
    console.log('PLAY Notation Player');
    console.log('');
    console.log('Usage:');
    console.log('  npx tsx scripts/play.ts <input.play> [--midi output.mid] [--realtime]');
    console.log('  npx tsx scripts/play.ts -e "<text>" [--midi output.mid] [--realtime]');
    console.log('');
    console.log('Examples:');
    console.log('  npx tsx scripts/play.ts tests/fixtures/scale.play');
    console.log('  npx tsx scripts/play.ts -e "T180 O3 L8 CDEFGAB>C" --midi scale.mid');
    process.exit(1);
  }

  let text = args.expression ?? '';

  try {
    if (args.input) {
      console.log(`Reading: ${args.input}`);
      text = await readPlayFile(args.input);
    }

    if (args.realtime) {
      await play(text, createRealtimeSink(undefined, {
        onEvent: (call) => console.log(formatCall(call)),
      }));
    } else {
      const events = collectEvents(text);
      for (const event of events) {
        console.log(formatCall(event));
      }
      const total = events.reduce((sum, event) => sum + event.duration, 0);
      console.log(`  Events: ${events.length}`);
      console.log(`  Duration: ${(total / 1000).toFixed(2)} s`);
    }

    if (args.midiPath) {
      console.log(`Writing: ${args.midiPath}`);
      await exportMidiToFile(text, args.midiPath);
    }

    console.log('Done!');
  } catch (error) {
    if (isPlayError(error)) {
      console.error(formatPlayError(error, text));
    } else {
      console.error('Error:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

main();
