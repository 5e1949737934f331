/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './range.js';
export * from './timestamp.js';
export { TimestampCompactor, compactLogLines, renderRecord, toLogLine } from './compactor.js';
export { RepeatCollapser, compactLines } from './repeat-collapser.js';
export { KeywordSplitter, type KeywordStream, type KeywordSplitterOptions } from './keyword-splitter.js';
export { logConsole, formatConsoleBlock, type LogLevel } from './logging.js';
