/**
 * GTKWave save file reader
 *
 * A .gtkw file lists the displayed traces one per line, mixed with
 * settings and markup. Signal lines are reduced to leaf names and bus
 * ranges are expanded into one name per bit.
 */

import { readFileSync } from 'fs';
import { ConversionError, ConversionErrorType } from '../errors.js';

// First characters of settings, comments, flags and group markers
const SKIP_MARKERS = '[*@#;-';

const BUS_RANGE = /^(.+)\[(\d+):(\d+)\]$/;

/**
 * Bit names for `base[from:to]`, walking from `from` to `to` in whichever
 * direction the range is written.
 */
export function expandRange(base: string, from: number, to: number): string[] {
  const names: string[] = [];
  const step = from >= to ? -1 : 1;
  for (let i = from; i !== to + step; i += step) {
    names.push(`${base}[${i}]`);
  }
  return names;
}

export function parseGtkwSignals(text: string): string[] {
  const signals: string[] = [];
  const seen = new Set<string>();

  const add = (name: string) => {
    if (seen.has(name)) return;
    seen.add(name);
    signals.push(name);
  };

  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line === '' || SKIP_MARKERS.includes(line[0])) continue;

    const full = line.split(/\s+/)[0];
    const segments = full.split('.');
    const leaf = segments[segments.length - 1];

    const bus = BUS_RANGE.exec(leaf);
    if (bus) {
      expandRange(bus[1], Number(bus[2]), Number(bus[3])).forEach(add);
    } else {
      add(leaf);
    }
  }

  return signals;
}

export function readGtkwFile(path: string): string[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (e) {
    const err = e as NodeJS.ErrnoException;
    throw new ConversionError(
      ConversionErrorType.FILE_ACCESS,
      `cannot open GTKWave save file '${path}': ${err.message}`
    );
  }
  return parseGtkwSignals(text);
}
