// CSV output for PulseView's CSV import

import { formatSeconds } from '../time/units.js';
import type { EmittedRow, RowSink } from '../types/vcd.js';

export const TIME_COLUMN = 'Time[s]';

export class CsvWriter implements RowSink {
  private lines: string[];
  private rows: number = 0;

  constructor(columnNames: readonly string[]) {
    this.lines = [[TIME_COLUMN, ...columnNames].join(',')];
  }

  writeRow(row: EmittedRow): void {
    this.lines.push([formatSeconds(row.timeFs), ...row.values].join(','));
    this.rows++;
  }

  get rowCount(): number {
    return this.rows;
  }

  toString(): string {
    return this.lines.join('\n') + '\n';
  }
}
