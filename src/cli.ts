#!/usr/bin/env node
/**
 * VCD to PulseView CSV converter
 *
 * Usage: vcd2csv <input.vcd> <output.csv> [options]
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { convertFile, type ConvertFileOptions } from './converter.js';
import { isConversionError } from './errors.js';
import { parseTimeSpec } from './time/units.js';

interface CliOptions {
  inputFile: string;
  outputFile: string;
  gtkwFile?: string;
  signals: string[];
  tmin?: string;
  tmax?: string;
  uniformStep?: string;
  ignoreMissing: boolean;
}

const VALUE_OPTIONS = new Set(['--gtkw', '--signal', '-s', '--tmin', '--tmax', '--uniform-step']);

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  const positional: string[] = [];
  const options: CliOptions = {
    inputFile: '',
    outputFile: '',
    signals: [],
    ignoreMissing: false,
  };

  for (let i = 0; i < cliArgs.length; i++) {
    let arg = cliArgs[i];
    let inlineValue: string | undefined;

    // --flag=value
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq !== -1) {
      inlineValue = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }

    if (arg === '-h' || arg === '--help') {
      return null;
    }
    if (arg === '--ignore-missing') {
      options.ignoreMissing = true;
      continue;
    }

    if (VALUE_OPTIONS.has(arg)) {
      let value = inlineValue;
      if (value === undefined) {
        if (i + 1 >= cliArgs.length) {
          console.error(`Error: ${arg} requires a value`);
          return null;
        }
        value = cliArgs[++i];
      }

      switch (arg) {
        case '--gtkw':
          options.gtkwFile = value;
          break;
        case '-s':
        case '--signal':
          options.signals.push(value);
          break;
        case '--tmin':
          options.tmin = value;
          break;
        case '--tmax':
          options.tmax = value;
          break;
        case '--uniform-step':
          options.uniformStep = value;
          break;
      }
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
    positional.push(arg);
  }

  if (positional.length !== 2) {
    console.error('Error: Expected an input VCD file and an output CSV file');
    return null;
  }

  [options.inputFile, options.outputFile] = positional;
  return options;
}

function printUsage(): void {
  console.log(`VCD to PulseView CSV converter

Usage: vcd2csv <input.vcd> <output.csv> [options]

Options:
  --gtkw <file>           Take the signal list from a GTKWave save file
  -s, --signal <name>     Signal to export (repeatable); bus bits as name[3]
  --tmin <time>           Skip rows before this time
  --tmax <time>           Stop after this time
  --uniform-step <time>   Output rows on a uniform time grid with this step
  --ignore-missing        Warn instead of failing on unknown signals
  -h, --help              Show this help message

Times are <value>[unit] with unit one of fs, ps, ns, us, ms, s.
Without a unit the value is in seconds.

Examples:
  vcd2csv sim.vcd sim.csv
  vcd2csv sim.vcd sim.csv --gtkw view.gtkw
  vcd2csv sim.vcd sim.csv -s clk -s "data[3]" --tmin 100ns --tmax 2us
  vcd2csv sim.vcd sim.csv --uniform-step 10ns`);
}

function toConvertOptions(options: CliOptions): ConvertFileOptions {
  return {
    gtkwPath: options.gtkwFile,
    signals: options.signals,
    ignoreMissing: options.ignoreMissing,
    tminFs: options.tmin ? parseTimeSpec(options.tmin, '--tmin') : undefined,
    tmaxFs: options.tmax ? parseTimeSpec(options.tmax, '--tmax') : undefined,
    uniformStepFs: options.uniformStep
      ? parseTimeSpec(options.uniformStep, '--uniform-step')
      : undefined,
  };
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  try {
    const result = convertFile(options.inputFile, options.outputFile, toConvertOptions(options));

    for (const warning of result.warnings) {
      console.error(`Warning: ${warning}`);
    }
    console.log(
      `Wrote ${result.rowCount} rows x ${result.columns.length} signals to ${options.outputFile}`
    );
    return 0;
  } catch (e) {
    if (isConversionError(e)) {
      console.error(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  process.exit(main());
}
