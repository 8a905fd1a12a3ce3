/**
 * Conversion errors
 *
 * Every fatal condition of a conversion run is reported as a ConversionError.
 * The CLI maps these to a diagnostic and exit code 1.
 */

export enum ConversionErrorType {
  FILE_ACCESS = 'FILE_ACCESS',
  NO_SIGNALS_FOUND = 'NO_SIGNALS_FOUND',
  MISSING_SIGNALS = 'MISSING_SIGNALS',
  INVALID_TIME_SPEC = 'INVALID_TIME_SPEC',
  INVALID_TIME_UNIT = 'INVALID_TIME_UNIT',
  EMPTY_EFFECTIVE_SELECTION = 'EMPTY_EFFECTIVE_SELECTION',
}

export class ConversionError extends Error {
  constructor(
    public readonly type: ConversionErrorType,
    message: string
  ) {
    super(message);
    this.name = 'ConversionError';
  }
}

export class MissingSignalsError extends ConversionError {
  constructor(public readonly names: string[]) {
    super(
      ConversionErrorType.MISSING_SIGNALS,
      `signals not found in VCD: ${names.join(', ')}`
    );
    this.name = 'MissingSignalsError';
  }
}

export function isConversionError(e: unknown): e is ConversionError {
  return e instanceof ConversionError;
}
