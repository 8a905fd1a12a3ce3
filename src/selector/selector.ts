// Signal selection: requested names -> output columns

import { SignalCatalogue } from '../parser/catalogue.js';
import { ConversionError, ConversionErrorType, MissingSignalsError } from '../errors.js';
import type { ColumnSource, OutputColumn } from '../types/vcd.js';

const BUS_BIT = /^(.+)\[(\d+)\]$/;

export interface SelectOptions {
  ignoreMissing?: boolean;
}

export interface Selection {
  columns: OutputColumn[];
  missing: string[];
  warnings: string[];
}

export interface RequestedSignals {
  // undefined means "all scalars"
  names: string[] | undefined;
  warnings: string[];
}

/**
 * Pick the name source: GTKWave file, then explicit list, then default.
 */
export function pickRequestedSignals(
  gtkwSignals: readonly string[] | undefined,
  explicitSignals: readonly string[] | undefined
): RequestedSignals {
  const warnings: string[] = [];

  if (gtkwSignals !== undefined) {
    if (gtkwSignals.length > 0) {
      return { names: [...gtkwSignals], warnings };
    }
    warnings.push('no signals parsed from GTKW file, falling back to --signal or all scalar signals.');
  }

  if (explicitSignals && explicitSignals.length > 0) {
    return { names: [...explicitSignals], warnings };
  }
  return { names: undefined, warnings };
}

/**
 * Resolve one name as a scalar alias or a `base[index]` bus bit.
 *
 * Vector payloads are written MSB first whatever the declared range
 * direction, so the offset counts from the declared MSB.
 */
export function resolveSignal(catalogue: SignalCatalogue, name: string): ColumnSource | undefined {
  const scalar = catalogue.scalarId(name);
  if (scalar !== undefined) {
    return { kind: 'scalar', id: scalar };
  }

  const bit = BUS_BIT.exec(name);
  if (!bit) return undefined;

  const index = Number(bit[2]);
  const bus = catalogue.findBus(bit[1], index);
  if (!bus) return undefined;

  const offset = bus.msb >= bus.lsb ? bus.msb - index : index - bus.msb;
  return { kind: 'bus-bit', id: bus.id, offset, width: bus.width };
}

/**
 * Build the column list. Without a request every scalar is taken, sorted
 * by name; otherwise the requested order is kept as given.
 */
export function selectColumns(
  catalogue: SignalCatalogue,
  requested: readonly string[] | undefined,
  options: SelectOptions = {}
): Selection {
  if (!requested || requested.length === 0) {
    const columns = catalogue
      .scalarNamesList()
      .sort()
      .map(name => ({ name, source: resolveSignal(catalogue, name) }))
      .filter((c): c is OutputColumn => c.source !== undefined);
    return { columns, missing: [], warnings: [] };
  }

  const columns: OutputColumn[] = [];
  const missing: string[] = [];

  for (const name of requested) {
    const source = resolveSignal(catalogue, name);
    if (source) {
      columns.push({ name, source });
    } else {
      missing.push(name);
    }
  }

  const warnings: string[] = [];
  if (missing.length > 0) {
    if (!options.ignoreMissing) {
      throw new MissingSignalsError(missing);
    }
    warnings.push(`signals not found in VCD: ${missing.join(', ')}`);
  }

  if (columns.length === 0) {
    throw new ConversionError(
      ConversionErrorType.EMPTY_EFFECTIVE_SELECTION,
      `none of the requested signals are present in VCD (missing: ${missing.join(', ')}).`
    );
  }

  return { columns, missing, warnings };
}
