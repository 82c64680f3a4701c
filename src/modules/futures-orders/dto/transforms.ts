import { TransformFnParams } from 'class-transformer';
import { DEFAULT_TIME_IN_FORCE } from './futures-order.types';

const upperTrimmed = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

export const toUpperTrimmed = ({ value }: TransformFnParams): unknown => upperTrimmed(value);

export const toTimeInForce = ({ value }: TransformFnParams): unknown =>
  value === undefined || value === null || value === '' ? DEFAULT_TIME_IN_FORCE : upperTrimmed(value);

// Plain decimal notation only; Number() would also take 0x10, 0b11 or 1e3
const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * CLI flags arrive as strings. Blank input stays undefined so that
 * presence rules can tell "not given" apart from "given as zero".
 * Anything that is not a plain decimal is left as a string for the
 * number checks to reject.
 */
export const toOptionalNumber = ({ value }: TransformFnParams): unknown => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : trimmed;
  }
  return value;
};
