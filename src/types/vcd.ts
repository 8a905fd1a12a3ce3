// Data model for VCD conversion

export type Bit = '0' | '1';

// Identifier code as written in the dump, e.g. '!' or '#'
export type SignalId = string;

// Declared signal: $var <type> <width> <id> <name> [range] $end
export interface SignalDeclaration {
  id: SignalId;
  name: string;
  width: number;
  type: string;
  line: number;
}

// Declaration with width > 1 and a resolved bit range
export interface BusDeclaration extends SignalDeclaration {
  msb: number;
  lsb: number;
}

// Where a column's value comes from
export type ColumnSource =
  | { kind: 'scalar'; id: SignalId }
  | { kind: 'bus-bit'; id: SignalId; offset: number; width: number };

export interface OutputColumn {
  name: string;
  source: ColumnSource;
}

// One line of output before formatting
export interface EmittedRow {
  timeFs: number;
  values: Bit[];
}

export interface RowSink {
  writeRow(row: EmittedRow): void;
}

// Lexer records, one per non-blank line

interface RecordBase {
  line: number;
  // Trimmed source line
  text: string;
}

// $keyword followed by the remaining whitespace-separated words
export interface KeywordRecord extends RecordBase {
  kind: 'keyword';
  keyword: string;
  args: string[];
}

// #<ticks>
export interface TimeRecord extends RecordBase {
  kind: 'time';
  ticks: number;
}

// <value><id>
export interface ScalarRecord extends RecordBase {
  kind: 'scalar';
  value: string;
  id: SignalId;
}

// b<bits> <id>
export interface VectorRecord extends RecordBase {
  kind: 'vector';
  bits: string;
  id: SignalId;
}

// r<number> <id>
export interface RealRecord extends RecordBase {
  kind: 'real';
  value: string;
  id: SignalId;
}

// Anything else: block contents, comments, unsupported value kinds
export interface TextRecord extends RecordBase {
  kind: 'text';
}

export type VcdRecord =
  | KeywordRecord
  | TimeRecord
  | ScalarRecord
  | VectorRecord
  | RealRecord
  | TextRecord;
