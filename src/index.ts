// vcd-to-csv - VCD to PulseView CSV conversion
// Multi-valued logic cleanup, bus bit selection and uniform resampling

// Conversion pipeline
export {
  convertVcd,
  convertFile,
  type ConvertOptions,
  type ConvertFileOptions,
  type ConversionResult,
} from './converter.js';

// Parsing
export { Lexer, tokenize } from './parser/lexer.js';
export { HeaderParser, parseHeader, parseTimescale, type VcdHeader } from './parser/header.js';
export { SignalCatalogue } from './parser/catalogue.js';

// Signal selection
export { parseGtkwSignals, readGtkwFile, expandRange } from './selector/gtkw.js';
export {
  selectColumns,
  resolveSignal,
  pickRequestedSignals,
  type Selection,
  type SelectOptions,
  type RequestedSignals,
} from './selector/selector.js';

// Emission
export { sanitizeBit, extractBusBit, ValueStore, DEFAULT_BIT } from './emitter/values.js';
export {
  EmissionEngine,
  EventEmissionEngine,
  UniformEmissionEngine,
  createEmissionEngine,
  type EmissionOptions,
} from './emitter/engine.js';
export { CsvWriter, TIME_COLUMN } from './writer/csv.js';

// Time units
export {
  parseTimeSpec,
  resolveTimescale,
  unitToFemtoseconds,
  ticksToFemtoseconds,
  formatSeconds,
  FS_PER_UNIT,
  FS_PER_SECOND,
  DEFAULT_TIMESCALE_FS,
} from './time/units.js';

// Errors
export {
  ConversionError,
  ConversionErrorType,
  MissingSignalsError,
  isConversionError,
} from './errors.js';

export type {
  Bit,
  SignalId,
  SignalDeclaration,
  BusDeclaration,
  ColumnSource,
  OutputColumn,
  EmittedRow,
  RowSink,
  VcdRecord,
  KeywordRecord,
  TimeRecord,
  ScalarRecord,
  VectorRecord,
  RealRecord,
  TextRecord,
} from './types/vcd.js';

// CLI
export { main as runCli } from './cli.js';
