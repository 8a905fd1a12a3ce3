// Time units: everything is normalized to femtoseconds

import { ConversionError, ConversionErrorType } from '../errors.js';

export const FS_PER_UNIT: Record<string, number> = {
  'fs': 1,
  'ps': 1e3,
  'ns': 1e6,
  'us': 1e9,
  'ms': 1e12,
  's': 1e15,
};

export const FS_PER_SECOND = FS_PER_UNIT['s'];

// Used when the dump has no usable $timescale
export const DEFAULT_TIMESCALE_FS = FS_PER_UNIT['ps'];

const UNIT_LIST = Object.keys(FS_PER_UNIT).join(',');

const TIME_SPEC = /^\s*(\d*\.?\d+(?:[eE][-+]?\d+)?)\s*([A-Za-z]+)?\s*$/;

// Drop binary noise such as 999999999.9999999 from products of decimals
function tidy(value: number): number {
  return Number.isInteger(value) ? value : Number(value.toPrecision(15));
}

/**
 * Femtoseconds per unit, or undefined for an unknown unit.
 * Units are case-insensitive.
 */
export function unitToFemtoseconds(unit: string): number | undefined {
  const key = unit.toLowerCase();
  return Object.prototype.hasOwnProperty.call(FS_PER_UNIT, key) ? FS_PER_UNIT[key] : undefined;
}

/**
 * Duration of one tick for a `$timescale` of `factor` `unit`.
 */
export function resolveTimescale(factor: number, unit: string): number | undefined {
  const fs = unitToFemtoseconds(unit);
  if (fs === undefined || !Number.isFinite(factor)) return undefined;
  return tidy(factor * fs);
}

/**
 * Parse a user time spec such as `10ns`, `2.5 us` or `1e-6`.
 * A bare number is in seconds.
 */
export function parseTimeSpec(spec: string, option: string): number {
  const match = TIME_SPEC.exec(spec);
  if (!match) {
    throw new ConversionError(
      ConversionErrorType.INVALID_TIME_SPEC,
      `invalid time specification '${spec}' for ${option}. ` +
        `Use <value>[unit] where unit is one of ${UNIT_LIST}.`
    );
  }

  const [, valueText, unit] = match;
  const value = Number(valueText);
  if (unit === undefined) {
    return tidy(value * FS_PER_SECOND);
  }

  const fs = unitToFemtoseconds(unit);
  if (fs === undefined) {
    throw new ConversionError(
      ConversionErrorType.INVALID_TIME_UNIT,
      `invalid time unit '${unit}' in ${option}. Use one of ${UNIT_LIST}.`
    );
  }
  return tidy(value * fs);
}

export function ticksToFemtoseconds(ticks: number, timescaleFs: number): number {
  return tidy(ticks * timescaleFs);
}

/**
 * Seconds with exactly 12 fractional digits, e.g. `0.000000005000`.
 */
export function formatSeconds(fs: number): string {
  return (fs / FS_PER_SECOND).toFixed(12);
}
