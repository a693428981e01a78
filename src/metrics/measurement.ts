import type { InformationUnit, Measurement } from './types.js';

/**
 * Bytes per unit
 */
const BYTES_PER_UNIT: Readonly<Record<InformationUnit, number>> = {
  bits: 1 / 8,
  bytes: 1,
  kilobytes: 1_000,
  megabytes: 1_000_000,
  gigabytes: 1_000_000_000,
  terabytes: 1_000_000_000_000,
  kibibytes: 1_024,
  mebibytes: 1_048_576,
  gibibytes: 1_073_741_824,
};

/**
 * Convert a measurement to a whole number of bytes (truncated toward zero)
 *
 * @example
 * toWholeBytes({ value: 1.5, unit: 'kilobytes' }) // 1500
 * toWholeBytes({ value: 12, unit: 'bits' })       // 1
 */
export function toWholeBytes(measurement: Measurement): number {
  return Math.trunc(measurement.value * BYTES_PER_UNIT[measurement.unit]);
}

export function bytes(value: number): Measurement {
  return { value, unit: 'bytes' };
}
