/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LineRange, RangeBounds } from './types.js';

export const UNBOUNDED: RangeBounds = Object.freeze({
  lines: Object.freeze({ start: 1 }),
  timestamps: Object.freeze({}),
});

export const hasTimestampBounds = (bounds: RangeBounds): boolean =>
  bounds.timestamps.start !== undefined || bounds.timestamps.end !== undefined;

export const isLineNumberIncluded = (lineNumber: number, range: LineRange): boolean => {
  if (lineNumber < range.start) {
    return false;
  }
  return range.end === undefined || lineNumber <= range.end;
};

/**
 * True once no later line can satisfy the line range.
 */
export const isPastLineRange = (lineNumber: number, range: LineRange): boolean =>
  range.end !== undefined && lineNumber > range.end;

/**
 * Decides whether a line survives the configured bounds. When any timestamp
 * bound is set, a line without a timestamp is excluded.
 */
export const isIncluded = (
  lineNumber: number,
  timestamp: number | undefined,
  bounds: RangeBounds,
): boolean => {
  if (!isLineNumberIncluded(lineNumber, bounds.lines)) {
    return false;
  }
  if (!hasTimestampBounds(bounds)) {
    return true;
  }
  if (timestamp === undefined) {
    return false;
  }
  const { start, end } = bounds.timestamps;
  if (start !== undefined && timestamp < start) {
    return false;
  }
  if (end !== undefined && timestamp > end) {
    return false;
  }
  return true;
};
