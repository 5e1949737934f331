/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExtractedTimestamp } from './types.js';

// Digits are any Unicode decimal digit (Nd), not only ASCII 0-9.
const EMBEDDED_NUMBER = /\p{Nd}+(?:\.\p{Nd}+)?/u;
const FLOAT_TOKEN = /^[+-]?(?:\p{Nd}+\.?\p{Nd}*|\.\p{Nd}+)(?:[eE][+-]?\p{Nd}+)?$/u;
const SPECIAL_FLOAT_TOKEN = /^([+-]?)(inf|infinity|nan)$/i;
const DECIMAL_DIGIT = /^\p{Nd}$/u;
const NON_ASCII_DIGIT = /(?![0-9])\p{Nd}/gu;
// Beyond this, toFixed switches to exponent notation.
const FIXED_NOTATION_LIMIT = 1e21;

/**
 * Substring rule: the first run of digits (with an optional fractional part)
 * anywhere in the line is the timestamp, and the rest of the line is its
 * content. Used as the grouping key in whole-file compaction.
 */
export const extractTimestamp = (raw: string): ExtractedTimestamp => {
  const match = EMBEDDED_NUMBER.exec(raw);
  if (!match) {
    return { content: stripTrailingNewlines(raw) };
  }
  const start = match.index;
  const end = start + match[0].length;
  return {
    timestamp: Number(toAsciiDigits(match[0])),
    content: stripTrailingNewlines(raw.slice(0, start) + raw.slice(end)),
  };
};

/**
 * Whitespace-token rule: the first whitespace-delimited token that reads as a
 * float. Used by the filtering path, which never looks inside tokens, so
 * `"id42 100.0"` yields 100 here but 42 from {@link extractTimestamp}.
 */
export const firstNumericToken = (raw: string): number | undefined => {
  for (const token of raw.trim().split(/\s+/)) {
    const value = parseFloatToken(token);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
};

/**
 * Parses a complete token as a float. Accepts an optional sign, a decimal
 * number with optional exponent, and `inf` / `infinity` / `nan`.
 */
export const parseFloatToken = (token: string): number | undefined => {
  const text = token.trim();
  if (FLOAT_TOKEN.test(text)) {
    return Number(toAsciiDigits(text));
  }
  const special = SPECIAL_FLOAT_TOKEN.exec(text);
  if (!special) {
    return undefined;
  }
  if (special[2].toLowerCase() === 'nan') {
    return Number.NaN;
  }
  return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
};

/**
 * Renders a timestamp with exactly three decimals, as used in group summaries.
 * Exact halfway values round to the even digit, huge values stay in plain
 * notation, and non-finite values print as `inf` / `-inf` / `nan`.
 */
export const formatTimestamp = (value: number): string => {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value < 0 ? '-inf' : 'inf';
  }
  if (Math.abs(value) >= FIXED_NOTATION_LIMIT) {
    // Doubles this large are integers.
    return `${BigInt(value)}.000`;
  }
  // A double lies exactly halfway between two thousandths iff 16x is an odd integer.
  const sixteenths = Math.abs(value) * 16;
  if (!Number.isInteger(sixteenths) || sixteenths % 2 === 0) {
    return value.toFixed(3);
  }
  const twiceThousandths = BigInt(sixteenths) * 125n;
  const lower = (twiceThousandths - 1n) / 2n;
  const thousandths = lower % 2n === 0n ? lower : lower + 1n;
  const fraction = (thousandths % 1000n).toString().padStart(3, '0');
  return `${value < 0 ? '-' : ''}${thousandths / 1000n}.${fraction}`;
};

/**
 * Maps every Unicode decimal digit to its ASCII counterpart so `Number` can read it.
 */
export const toAsciiDigits = (text: string): string =>
  text.replace(NON_ASCII_DIGIT, (digit) => String(digitValue(digit)));

// Nd digits come in contiguous blocks made of whole 0-9 runs.
const digitValue = (digit: string): number => {
  const code = digit.codePointAt(0) ?? 0;
  let start = code;
  while (DECIMAL_DIGIT.test(String.fromCodePoint(start - 1))) {
    start -= 1;
  }
  return (code - start) % 10;
};

const stripTrailingNewlines = (text: string): string => text.replace(/\n+$/, '');
