import { describe, it, expect } from 'vitest';
import {
  parseTimeSpec,
  resolveTimescale,
  unitToFemtoseconds,
  ticksToFemtoseconds,
  formatSeconds,
  DEFAULT_TIMESCALE_FS,
} from '../src/time/units.js';
import { ConversionError, ConversionErrorType } from '../src/errors.js';

function errorType(fn: () => unknown): ConversionErrorType | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConversionError) return e.type;
    throw e;
  }
  return undefined;
}

describe('Time units', () => {
  describe('parseTimeSpec', () => {
    it('should parse nanoseconds', () => {
      expect(parseTimeSpec('10ns', '--tmin')).toBe(1e7);
    });

    it('should parse fractional microseconds', () => {
      expect(parseTimeSpec('2.5us', '--tmin')).toBe(2.5e9);
    });

    it('should treat a bare number as seconds', () => {
      expect(parseTimeSpec('3', '--tmax')).toBe(3e15);
    });

    it('should accept exponents', () => {
      expect(parseTimeSpec('1e-6', '--tmax')).toBe(1e9);
    });

    it('should accept whitespace and any case in the unit', () => {
      expect(parseTimeSpec(' 0.5 ms ', '--tmin')).toBe(5e11);
      expect(parseTimeSpec('100PS', '--tmin')).toBe(1e5);
    });

    it('should parse femtoseconds', () => {
      expect(parseTimeSpec('7fs', '--uniform-step')).toBe(7);
    });

    it('should reject malformed numbers', () => {
      expect(errorType(() => parseTimeSpec('abc', '--tmin'))).toBe(ConversionErrorType.INVALID_TIME_SPEC);
      expect(errorType(() => parseTimeSpec('', '--tmin'))).toBe(ConversionErrorType.INVALID_TIME_SPEC);
      expect(errorType(() => parseTimeSpec('1.2.3ns', '--tmin'))).toBe(ConversionErrorType.INVALID_TIME_SPEC);
    });

    it('should reject unknown units', () => {
      expect(errorType(() => parseTimeSpec('10xs', '--tmin'))).toBe(ConversionErrorType.INVALID_TIME_UNIT);
      expect(errorType(() => parseTimeSpec('1ks', '--tmin'))).toBe(ConversionErrorType.INVALID_TIME_UNIT);
    });

    it('should name the option in the message', () => {
      expect(() => parseTimeSpec('abc', '--uniform-step')).toThrow(
        "invalid time specification 'abc' for --uniform-step"
      );
      expect(() => parseTimeSpec('5min', '--tmax')).toThrow("invalid time unit 'min' in --tmax");
    });
  });

  describe('timescale', () => {
    it('should look up units', () => {
      expect(unitToFemtoseconds('ns')).toBe(1e6);
      expect(unitToFemtoseconds('S')).toBe(1e15);
      expect(unitToFemtoseconds('min')).toBeUndefined();
    });

    it('should multiply factor and unit', () => {
      expect(resolveTimescale(10, 'ps')).toBe(10000);
      expect(resolveTimescale(100, 'us')).toBe(1e11);
      expect(resolveTimescale(1, 'ks')).toBeUndefined();
    });

    it('should default to one picosecond', () => {
      expect(DEFAULT_TIMESCALE_FS).toBe(1000);
    });

    it('should convert ticks', () => {
      expect(ticksToFemtoseconds(5, 1e6)).toBe(5e6);
      expect(ticksToFemtoseconds(0, 1e6)).toBe(0);
    });
  });

  describe('formatSeconds', () => {
    it('should print twelve fractional digits', () => {
      expect(formatSeconds(0)).toBe('0.000000000000');
      expect(formatSeconds(5e6)).toBe('0.000000005000');
      expect(formatSeconds(5000)).toBe('0.000000000005');
      expect(formatSeconds(1.5e15)).toBe('1.500000000000');
    });
  });
});
