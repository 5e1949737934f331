/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ProcessingMode } from '../core/types.js';

export interface RunStartInfo {
  mode: ProcessingMode;
  inputPath: string;
  outputPaths: string[];
}

export interface RunProgressInfo {
  linesRead: number;
  recordsWritten: number;
}

export interface RunSummary extends RunStartInfo, RunProgressInfo {
  /** Lines routed to each keyword; split modes only. */
  keywordCounts?: Record<string, number>;
}

/**
 * Hooks a caller can attach to follow a run. All are optional.
 */
export interface ProcessingObserver {
  onStart?(info: RunStartInfo): void;
  onProgress?(info: RunProgressInfo): void;
  onComplete?(summary: RunSummary): void;
}
