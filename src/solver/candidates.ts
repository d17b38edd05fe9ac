/**
 * Candidate sets as 9-bit masks: bit d-1 is set while digit d is still possible
 */

import { DIGITS, Digit } from '../model/types';

export type CandidateMask = number;

export const EMPTY_MASK: CandidateMask = 0;
export const ALL_DIGITS_MASK: CandidateMask = 0x1ff;

export const digitBit = (digit: Digit): CandidateMask => 1 << (digit - 1);

export const hasDigit = (mask: CandidateMask, digit: Digit): boolean => (mask & digitBit(digit)) !== 0;

export function countDigits(mask: CandidateMask): number {
  let n = 0;
  for (let m = mask; m; m &= m - 1) n++;
  return n;
}

/** Digits of a mask in increasing order */
export function maskDigits(mask: CandidateMask): Digit[] {
  return DIGITS.filter((d) => hasDigit(mask, d));
}

/** The only digit of a singleton mask, otherwise null */
export function singleDigit(mask: CandidateMask): Digit | null {
  if (mask === EMPTY_MASK || (mask & (mask - 1)) !== 0) return null;
  return DIGITS.find((d) => digitBit(d) === mask) ?? null;
}

export function maskOf(digits: Iterable<Digit>): CandidateMask {
  let mask = EMPTY_MASK;
  for (const d of digits) mask |= digitBit(d);
  return mask;
}

export function formatMask(mask: CandidateMask): string {
  return `{${maskDigits(mask).join(',')}}`;
}
