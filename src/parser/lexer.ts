// Lexer for Value Change Dump files
//
// VCD is line oriented as written by simulators: one declaration, time
// marker or value change per line. Each non-blank line becomes one record.

import type { VcdRecord } from '../types/vcd.js';

const SCALAR_VALUES = '01xXzZ';
const VECTOR_BITS = /^[bB]([01xXzZ]+)$/;
const REAL_VALUE = /^[rR](\S+)$/;
const TIME_MARKER = /^#(\d+)$/;

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private records: VcdRecord[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): VcdRecord[] {
    this.records = [];
    this.pos = 0;
    this.line = 1;

    while (this.pos < this.source.length) {
      const text = this.readLine().trim();
      if (text !== '') {
        this.records.push(this.classify(text));
      }
      this.line++;
    }

    return this.records;
  }

  private readLine(): string {
    const end = this.source.indexOf('\n', this.pos);
    const stop = end === -1 ? this.source.length : end;
    const text = this.source.slice(this.pos, stop);
    this.pos = stop + 1;
    return text;
  }

  private classify(text: string): VcdRecord {
    const line = this.line;
    const words = text.split(/\s+/);
    const first = words[0];

    if (first.startsWith('$')) {
      return { kind: 'keyword', keyword: first.slice(1), args: words.slice(1), line, text };
    }

    const time = TIME_MARKER.exec(text);
    if (time) {
      return { kind: 'time', ticks: Number(time[1]), line, text };
    }

    if (words.length === 1 && first.length > 1 && SCALAR_VALUES.includes(first[0])) {
      return { kind: 'scalar', value: first[0], id: first.slice(1), line, text };
    }

    if (words.length === 2) {
      const vector = VECTOR_BITS.exec(first);
      if (vector) {
        return { kind: 'vector', bits: vector[1], id: words[1], line, text };
      }
      const real = REAL_VALUE.exec(first);
      if (real) {
        return { kind: 'real', value: real[1], id: words[1], line, text };
      }
    }

    return { kind: 'text', line, text };
  }
}

export function tokenize(source: string): VcdRecord[] {
  return new Lexer(source).tokenize();
}
