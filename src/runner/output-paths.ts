/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

const LOG_SUFFIX = '.log';

/**
 * Derives one output file per keyword: a single trailing `.log` is dropped
 * from the base, then `.<keyword>.log` is appended.
 *
 * @example resolveSplitOutputPaths('logs/run.log', ['a']) // Map { 'a' => 'logs/run.a.log' }
 */
export const resolveSplitOutputPaths = (
  output: string,
  keywords: readonly string[],
): Map<string, string> => {
  const base = output.endsWith(LOG_SUFFIX) ? output.slice(0, -LOG_SUFFIX.length) : output;
  return new Map(keywords.map((keyword) => [keyword, `${base}.${keyword}${LOG_SUFFIX}`]));
};
