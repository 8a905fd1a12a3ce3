// Header parser: $timescale and $var declarations up to $enddefinitions

import { tokenize } from './lexer.js';
import { SignalCatalogue } from './catalogue.js';
import { ConversionError, ConversionErrorType } from '../errors.js';
import { DEFAULT_TIMESCALE_FS, resolveTimescale } from '../time/units.js';
import type { KeywordRecord, VcdRecord } from '../types/vcd.js';

export interface VcdHeader {
  // Duration of one tick in femtoseconds
  timescaleFs: number;
  catalogue: SignalCatalogue;
  // Records after $enddefinitions
  body: VcdRecord[];
}

const TIMESCALE = /^(\d+)\s*([A-Za-z]+)$/;
const RANGE = /^\[(\d+):(\d+)\]/;
const WIDTH = /^\d+$/;

function withoutEnd(words: string[]): string[] {
  const end = words.indexOf('$end');
  return end === -1 ? words : words.slice(0, end);
}

function timescaleFromText(text: string): number | undefined {
  const match = TIMESCALE.exec(text);
  if (!match) return undefined;
  return resolveTimescale(Number(match[1]), match[2]);
}

/**
 * Tick duration in femtoseconds from the first well-formed `$timescale`
 * entry, or the 1 ps default.
 */
export function parseTimescale(records: readonly VcdRecord[]): number {
  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (record.kind !== 'keyword') continue;
    if (record.keyword === 'enddefinitions') break;
    if (record.keyword !== 'timescale') continue;

    // Single-line form: $timescale 1ns $end
    const inline = withoutEnd(record.args).join(' ');
    if (inline !== '') {
      const fs = timescaleFromText(inline);
      if (fs !== undefined) return fs;
    }
    if (record.args.includes('$end')) continue;

    // Block form: one entry per line until $end
    for (i++; i < records.length; i++) {
      const entry = records[i];
      if (entry.kind === 'keyword' && entry.keyword === 'end') break;

      const words = entry.text.split(/\s+/);
      const fs = timescaleFromText(withoutEnd(words).join(' '));
      if (fs !== undefined) return fs;
      if (words.includes('$end')) break;
    }
  }

  return DEFAULT_TIMESCALE_FS;
}

export class HeaderParser {
  private records: VcdRecord[];
  private pos: number = 0;
  private catalogue: SignalCatalogue = new SignalCatalogue();

  constructor(records: VcdRecord[]) {
    this.records = records;
  }

  parse(): VcdHeader {
    this.pos = 0;
    this.catalogue = new SignalCatalogue();

    const timescaleFs = parseTimescale(this.records);
    let bodyStart = this.records.length;

    while (this.pos < this.records.length) {
      const record = this.records[this.pos++];
      if (record.kind !== 'keyword') continue;

      if (record.keyword === 'enddefinitions') {
        bodyStart = this.pos;
        break;
      }
      if (record.keyword === 'var') {
        this.parseVar(record);
      }
    }

    if (this.catalogue.isEmpty) {
      throw new ConversionError(
        ConversionErrorType.NO_SIGNALS_FOUND,
        'no signals (scalar or bus) found in VCD.'
      );
    }

    return {
      timescaleFs,
      catalogue: this.catalogue,
      body: this.records.slice(bodyStart),
    };
  }

  // $var <type> <width> <id> <name> [range] $end
  private parseVar(record: KeywordRecord): void {
    const args = record.args;
    if (args.length < 4 || !WIDTH.test(args[1])) return;

    const width = Number(args[1]);
    const [type, , id, name] = args;

    if (width === 1) {
      this.catalogue.addScalar({ id, name, width, type, line: record.line });
      return;
    }
    if (width < 1) return;

    let msb = width - 1;
    let lsb = 0;
    const range = args.length >= 6 && args[4].startsWith('[') && args[4].endsWith(']')
      ? RANGE.exec(args[4])
      : null;
    if (range) {
      msb = Number(range[1]);
      lsb = Number(range[2]);
    }

    this.catalogue.addBus({ id, name, width, type, line: record.line, msb, lsb });
  }
}

export function parseHeader(source: string): VcdHeader {
  return new HeaderParser(tokenize(source)).parse();
}
