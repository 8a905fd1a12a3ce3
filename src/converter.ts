/**
 * VCD -> CSV conversion pipeline
 *
 * header -> selection -> emission -> CSV text. Everything happens in
 * memory; the output file is written once, after the last row.
 */

import { readFileSync, writeFileSync } from 'fs';
import { parseHeader } from './parser/header.js';
import { pickRequestedSignals, selectColumns } from './selector/selector.js';
import { readGtkwFile } from './selector/gtkw.js';
import { createEmissionEngine } from './emitter/engine.js';
import { CsvWriter } from './writer/csv.js';
import { ConversionError, ConversionErrorType } from './errors.js';

export interface ConvertOptions {
  // Column names; all scalars when absent or empty
  signals?: string[];
  tminFs?: number;
  tmaxFs?: number;
  // Uniform grid step; event mode when absent
  uniformStepFs?: number;
  ignoreMissing?: boolean;
}

export interface ConvertFileOptions extends ConvertOptions {
  // GTKWave save file; takes precedence over `signals`
  gtkwPath?: string;
}

export interface ConversionResult {
  csv: string;
  columns: string[];
  rowCount: number;
  timescaleFs: number;
  warnings: string[];
}

export function convertVcd(source: string, options: ConvertOptions = {}): ConversionResult {
  const header = parseHeader(source);
  const selection = selectColumns(header.catalogue, options.signals, {
    ignoreMissing: options.ignoreMissing,
  });

  const columns = selection.columns.map(c => c.name);
  const writer = new CsvWriter(columns);
  const engine = createEmissionEngine({
    columns: selection.columns,
    timescaleFs: header.timescaleFs,
    sink: writer,
    tminFs: options.tminFs,
    tmaxFs: options.tmaxFs,
    uniformStepFs: options.uniformStepFs,
  });
  engine.run(header.body);

  return {
    csv: writer.toString(),
    columns,
    rowCount: writer.rowCount,
    timescaleFs: header.timescaleFs,
    warnings: selection.warnings,
  };
}

export function convertFile(
  inputPath: string,
  outputPath: string,
  options: ConvertFileOptions = {}
): ConversionResult {
  const { gtkwPath, ...rest } = options;
  const gtkwSignals = gtkwPath !== undefined ? readGtkwFile(gtkwPath) : undefined;
  const requested = pickRequestedSignals(gtkwSignals, rest.signals);

  let source: string;
  try {
    source = readFileSync(inputPath, 'utf-8');
  } catch (e) {
    const err = e as NodeJS.ErrnoException;
    throw new ConversionError(
      ConversionErrorType.FILE_ACCESS,
      `cannot open VCD file '${inputPath}': ${err.message}`
    );
  }

  const result = convertVcd(source, { ...rest, signals: requested.names });

  try {
    writeFileSync(outputPath, result.csv);
  } catch (e) {
    const err = e as NodeJS.ErrnoException;
    throw new ConversionError(
      ConversionErrorType.FILE_ACCESS,
      `cannot open output CSV file '${outputPath}' for writing: ${err.message}`
    );
  }

  return { ...result, warnings: [...requested.warnings, ...result.warnings] };
}
