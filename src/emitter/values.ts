// Value sanitizer: four-state VCD values -> two-state bits

import type { Bit } from '../types/vcd.js';

// Idle level of a pulled-up line; also the value of a column never observed
export const DEFAULT_BIT: Bit = '1';

/**
 * Resolve one raw value against the previous clean bit.
 *   0/1 -> as is
 *   z   -> 1 (line released, pull-up)
 *   x   -> previous value, or 1 without history
 */
export function sanitizeBit(raw: string, prev?: Bit): Bit {
  switch (raw.toLowerCase()) {
    case '0':
      return '0';
    case '1':
      return '1';
    case 'z':
      return '1';
    default:
      return prev ?? DEFAULT_BIT;
  }
}

function isUnknown(ch: string): boolean {
  const lower = ch.toLowerCase();
  return lower === 'x' || lower === 'z';
}

/**
 * Raw bit at `offset` (from the MSB) of a vector payload for a bus of
 * `width` bits. Short payloads are extended on the left with their leading
 * x/z, or with 0. Offsets past the payload read as x.
 */
export function extractBusBit(bits: string, width: number, offset: number): string {
  const pad = bits.length > 0 && isUnknown(bits[0]) ? bits[0] : '0';
  const padded = bits.padStart(width, pad);
  return offset < padded.length ? padded[offset] : 'x';
}

interface Cell {
  value: Bit;
  observed: boolean;
}

/**
 * Last known clean value per column name.
 */
export class ValueStore {
  private cells: Map<string, Cell> = new Map();

  constructor(names: readonly string[]) {
    for (const name of names) {
      this.cells.set(name, { value: DEFAULT_BIT, observed: false });
    }
  }

  get(name: string): Bit {
    return this.cells.get(name)?.value ?? DEFAULT_BIT;
  }

  observed(name: string): boolean {
    return this.cells.get(name)?.observed ?? false;
  }

  /**
   * Apply a raw value. Returns true when the visible state changed: a new
   * clean value, or the first observation of the column.
   */
  update(name: string, raw: string): boolean {
    let cell = this.cells.get(name);
    if (!cell) {
      cell = { value: DEFAULT_BIT, observed: false };
      this.cells.set(name, cell);
    }

    const next = sanitizeBit(raw, cell.observed ? cell.value : undefined);
    const changed = !cell.observed || next !== cell.value;
    cell.value = next;
    cell.observed = true;
    return changed;
  }

  snapshot(names: readonly string[]): Bit[] {
    return names.map(name => this.get(name));
  }
}
