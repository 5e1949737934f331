/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runCompactLog,
  resolveMode,
  DEFAULT_PROGRESS_INTERVAL,
  type CompactLogOptions,
  type CompactLogResult,
} from './compact-log.js';

export { streamSourceLines, filterSourceLines } from './line-reader.js';

export { resolveSplitOutputPaths } from './output-paths.js';

export {
  FileLineSink,
  closeAll,
  ensureDirectory,
  ensureParentDirectory,
} from './output-sink.js';
