/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { compactLogLines, renderRecord } from '../core/compactor.js';
import { EmptyKeywordListError } from '../core/errors.js';
import { KeywordSplitter } from '../core/keyword-splitter.js';
import { UNBOUNDED } from '../core/range.js';
import type { LineSink, ProcessingMode, RangeBounds, SourceLine } from '../core/types.js';
import type { ProcessingObserver, RunSummary } from '../types/observer.js';
import { filterSourceLines, streamSourceLines } from './line-reader.js';
import { resolveSplitOutputPaths } from './output-paths.js';
import { closeAll, ensureParentDirectory, FileLineSink } from './output-sink.js';

export const DEFAULT_PROGRESS_INTERVAL = 10_000;

export interface CompactLogOptions {
  inputPath: string;
  /** Output file, or the base name of the per-keyword files when splitting. */
  outputPath: string;
  compact?: boolean;
  /** Keywords to split by. Leaving this unset disables splitting. */
  keywords?: readonly string[];
  bounds?: RangeBounds;
  observer?: ProcessingObserver;
  /** Lines read between two `onProgress` events. */
  progressInterval?: number;
}

export type CompactLogResult = RunSummary;

export const resolveMode = (split: boolean, compact: boolean): ProcessingMode => {
  if (split) {
    return compact ? 'split-compact' : 'split';
  }
  return compact ? 'compact' : 'copy';
};

class RunProgress {
  linesRead = 0;
  recordsWritten = 0;

  constructor(
    private readonly observer: ProcessingObserver | undefined,
    private readonly interval: number,
  ) {}

  async *track(lines: AsyncIterable<SourceLine>): AsyncGenerator<SourceLine> {
    for await (const line of lines) {
      this.linesRead += 1;
      if (this.linesRead % this.interval === 0) {
        this.report();
      }
      yield line;
    }
  }

  report(): void {
    this.observer?.onProgress?.({
      linesRead: this.linesRead,
      recordsWritten: this.recordsWritten,
    });
  }
}

/**
 * Runs one pass over the input in the mode selected by `keywords` and
 * `compact`.
 *
 * Compact-only mode groups the whole file and filters each group's members
 * afterwards; the split modes filter first and compact what is left. The two
 * orders give different results on purpose and must not be merged.
 */
export async function runCompactLog(options: CompactLogOptions): Promise<CompactLogResult> {
  const bounds = options.bounds ?? UNBOUNDED;
  const keywords = options.keywords;
  if (keywords !== undefined && keywords.length === 0) {
    throw new EmptyKeywordListError();
  }
  const mode = resolveMode(keywords !== undefined, options.compact ?? false);
  const keywordPaths =
    keywords !== undefined ? resolveSplitOutputPaths(options.outputPath, keywords) : undefined;
  const outputPaths = keywordPaths ? [...keywordPaths.values()] : [options.outputPath];
  const progress = new RunProgress(
    options.observer,
    Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL),
  );

  // Output directories exist before the input is opened.
  for (const path of outputPaths) {
    await ensureParentDirectory(path);
  }
  const input = await fs.open(options.inputPath, 'r');
  const opened: LineSink[] = [];
  const openSink = async (path: string): Promise<LineSink> => {
    const sink = await FileLineSink.open(path);
    opened.push(sink);
    return sink;
  };

  try {
    const keywordSinks = new Map<string, LineSink>();
    for (const [keyword, path] of keywordPaths ?? []) {
      keywordSinks.set(keyword, await openSink(path));
    }
    const sink = keywordPaths ? undefined : await openSink(options.outputPath);
    options.observer?.onStart?.({ mode, inputPath: options.inputPath, outputPaths });

    const source = progress.track(
      streamSourceLines(input.createReadStream({ autoClose: false })),
    );
    let keywordCounts: Record<string, number> | undefined;

    if (sink && mode === 'copy') {
      for await (const line of filterSourceLines(source, bounds)) {
        await sink.write(line.hasNewline ? `${line.raw}\n` : line.raw);
        progress.recordsWritten += 1;
      }
    } else if (sink) {
      for await (const record of compactLogLines(source, bounds)) {
        await sink.write(renderRecord(record));
        progress.recordsWritten += 1;
      }
    } else {
      const splitter = new KeywordSplitter(keywordSinks, { compact: mode === 'split-compact' });
      for await (const line of filterSourceLines(source, bounds)) {
        progress.recordsWritten += await splitter.accept(line);
      }
      progress.recordsWritten += await splitter.flush();
      keywordCounts = splitter.routedCounts();
    }

    progress.report();
    await closeAll(opened);
    const summary: CompactLogResult = {
      mode,
      inputPath: options.inputPath,
      outputPaths,
      linesRead: progress.linesRead,
      recordsWritten: progress.recordsWritten,
      keywordCounts,
    };
    options.observer?.onComplete?.(summary);
    return summary;
  } finally {
    // Sinks closed above ignore the second close; this releases them on the error path.
    await closeAll(opened);
    await input.close();
  }
}
