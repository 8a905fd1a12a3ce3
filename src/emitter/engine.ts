/**
 * Emission engine
 *
 * Walks the body records once, keeps the clean value of every selected
 * column and hands rows to a sink. Two policies:
 *
 *  - event:   one row per time at which a selected column changed
 *  - uniform: one row per grid point, sampling the state in force there
 */

import { ValueStore, extractBusBit } from './values.js';
import { ConversionError, ConversionErrorType } from '../errors.js';
import { ticksToFemtoseconds } from '../time/units.js';
import type { OutputColumn, RowSink, SignalId, VcdRecord } from '../types/vcd.js';

export interface EmissionOptions {
  columns: readonly OutputColumn[];
  timescaleFs: number;
  sink: RowSink;
  tminFs?: number;
  tmaxFs?: number;
  // Grid step; selects the uniform policy when set
  uniformStepFs?: number;
}

interface BusBitTarget {
  name: string;
  offset: number;
  width: number;
}

export abstract class EmissionEngine {
  protected readonly names: string[];
  protected readonly values: ValueStore;
  protected readonly tminFs: number | undefined;
  protected readonly tmaxFs: number | undefined;
  protected currentFs: number | undefined;

  private readonly timescaleFs: number;
  private readonly sink: RowSink;
  private readonly scalarTargets: Map<SignalId, string[]> = new Map();
  private readonly busTargets: Map<SignalId, BusBitTarget[]> = new Map();
  private stopped: boolean = false;
  private rows: number = 0;

  constructor(options: EmissionOptions) {
    this.names = options.columns.map(c => c.name);
    this.values = new ValueStore(this.names);
    this.timescaleFs = options.timescaleFs;
    this.sink = options.sink;
    this.tminFs = options.tminFs;
    this.tmaxFs = options.tmaxFs;

    for (const column of options.columns) {
      const source = column.source;
      if (source.kind === 'scalar') {
        const list = this.scalarTargets.get(source.id) ?? [];
        list.push(column.name);
        this.scalarTargets.set(source.id, list);
      } else {
        const list = this.busTargets.get(source.id) ?? [];
        list.push({ name: column.name, offset: source.offset, width: source.width });
        this.busTargets.set(source.id, list);
      }
    }
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get rowCount(): number {
    return this.rows;
  }

  /**
   * Process body records, then emit whatever the end of the dump implies.
   */
  run(records: Iterable<VcdRecord>): void {
    for (const record of records) {
      if (this.stopped) break;

      switch (record.kind) {
        case 'time':
          this.advance(record.ticks);
          break;
        case 'scalar':
          this.applyScalar(record.id, record.value);
          break;
        case 'vector':
          this.applyVector(record.id, record.bits);
          break;
        default:
          // Keywords, real values and stray text carry no selected state
          break;
      }
    }

    if (!this.stopped) {
      this.finish();
    }
  }

  applyScalar(id: SignalId, value: string): void {
    const targets = this.scalarTargets.get(id);
    if (!targets) return;
    for (const name of targets) {
      if (this.values.update(name, value)) this.onChange();
    }
  }

  applyVector(id: SignalId, bits: string): void {
    const targets = this.busTargets.get(id);
    if (!targets) return;
    for (const target of targets) {
      const raw = extractBusBit(bits, target.width, target.offset);
      if (this.values.update(target.name, raw)) this.onChange();
    }
  }

  // Move the clock to a new time marker
  abstract advance(ticks: number): void;

  // End of the dump
  abstract finish(): void;

  protected onChange(): void {
    // Only the event policy tracks changes
  }

  protected setTime(ticks: number): void {
    this.currentFs = this.toFemtoseconds(ticks);
  }

  protected toFemtoseconds(ticks: number): number {
    return ticksToFemtoseconds(ticks, this.timescaleFs);
  }

  protected emit(timeFs: number): void {
    this.sink.writeRow({ timeFs, values: this.values.snapshot(this.names) });
    this.rows++;
  }

  protected stop(): void {
    this.stopped = true;
  }
}

export class EventEmissionEngine extends EmissionEngine {
  private pendingChange: boolean = false;

  advance(ticks: number): void {
    if (this.flush()) {
      this.stop();
      return;
    }
    this.setTime(ticks);
  }

  finish(): void {
    this.flush();
  }

  protected onChange(): void {
    this.pendingChange = true;
  }

  /**
   * Write the row for the current time if anything changed.
   * Returns true when that row lies past tmax.
   */
  private flush(): boolean {
    if (this.currentFs === undefined || !this.pendingChange) return false;

    const t = this.currentFs;
    if (this.tminFs !== undefined && t < this.tminFs) {
      this.pendingChange = false;
      return false;
    }
    if (this.tmaxFs !== undefined && t > this.tmaxFs) {
      return true;
    }

    this.emit(t);
    this.pendingChange = false;
    return false;
  }
}

export class UniformEmissionEngine extends EmissionEngine {
  private readonly stepFs: number;
  // First grid point; fixed once set
  private anchorFs: number | undefined;
  private sampleIndex: number = 0;

  constructor(options: EmissionOptions & { uniformStepFs: number }) {
    super(options);
    if (!(options.uniformStepFs > 0)) {
      throw new ConversionError(
        ConversionErrorType.INVALID_TIME_SPEC,
        'uniform step must be greater than zero.'
      );
    }
    this.stepFs = options.uniformStepFs;
  }

  advance(ticks: number): void {
    const next = this.toFemtoseconds(ticks);
    if (this.currentFs !== undefined) {
      // State now reflects every change made at currentFs
      this.emitBetween(this.currentFs, next);
      if (this.tmaxFs !== undefined && next > this.tmaxFs) {
        // Later intervals start past tmax and can hold no sample
        this.stop();
      }
    }
    this.setTime(ticks);
  }

  finish(): void {
    if (this.currentFs === undefined) return;

    let end = this.currentFs;
    if (this.tmaxFs !== undefined && this.tmaxFs > end) {
      end = this.tmaxFs;
    }
    this.emitBetween(this.currentFs, end);
  }

  // Grid points in [from, to), none past tmax
  private emitBetween(fromFs: number, toFs: number): void {
    if (this.tmaxFs !== undefined && fromFs > this.tmaxFs) return;

    const anchor = this.anchorFs ?? (this.tminFs !== undefined && this.tminFs > fromFs ? this.tminFs : fromFs);
    this.anchorFs = anchor;

    for (;;) {
      const t = anchor + this.sampleIndex * this.stepFs;
      if (t >= toFs) break;
      if (this.tmaxFs !== undefined && t > this.tmaxFs) break;
      this.emit(t);
      this.sampleIndex++;
    }
  }
}

export function createEmissionEngine(options: EmissionOptions): EmissionEngine {
  const step = options.uniformStepFs;
  if (step !== undefined) {
    return new UniformEmissionEngine({ ...options, uniformStepFs: step });
  }
  return new EventEmissionEngine(options);
}
