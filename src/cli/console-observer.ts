/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { logConsole } from '../core/logging.js';
import type { ProcessingObserver } from '../types/index.js';

/**
 * Observer for non-interactive terminals: every event becomes a log block.
 */
export const createConsoleObserver = (): ProcessingObserver => ({
  onStart: (info) => {
    logConsole('info', 'Run started', [
      ['mode', info.mode],
      ['input', info.inputPath],
      ['outputs', info.outputPaths.join(', ')],
    ]);
  },
  onProgress: (info) => {
    logConsole('info', 'Progress', [
      ['lines read', info.linesRead],
      ['records written', info.recordsWritten],
    ]);
  },
  onComplete: (summary) => {
    const keywordFields = Object.entries(summary.keywordCounts ?? {}).map(
      ([keyword, count]): [string, number] => [`keyword ${keyword}`, count],
    );
    logConsole('info', 'Run complete', [
      ['lines read', summary.linesRead],
      ['records written', summary.recordsWritten],
      ...keywordFields,
    ]);
  },
});
