/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * One line of the input as read from disk.
 */
export interface SourceLine {
  /** Line text without its terminator. */
  readonly raw: string;
  /** 1-based position in the input. */
  readonly lineNumber: number;
  /** False only for a final line that ends without a newline. */
  readonly hasNewline: boolean;
}

export interface ExtractedTimestamp {
  timestamp?: number;
  content: string;
}

/**
 * A source line with its embedded timestamp pulled out. `content` is the
 * equality key for whole-file compaction.
 */
export interface LogLine extends SourceLine {
  readonly timestamp?: number;
  readonly content: string;
}

export interface LineRange {
  start: number;
  end?: number;
}

export interface TimestampRange {
  start?: number;
  end?: number;
}

export interface RangeBounds {
  lines: LineRange;
  timestamps: TimestampRange;
}

export type CompactRecord =
  | { kind: 'line'; line: LogLine }
  | {
      kind: 'summary';
      content: string;
      count: number;
      firstTimestamp?: number;
      lastTimestamp?: number;
    };

export type ProcessingMode = 'copy' | 'compact' | 'split' | 'split-compact';

/**
 * Destination for rendered output text. Callers pass complete lines,
 * terminators included.
 */
export interface LineSink {
  readonly path: string;
  write(text: string): Promise<void>;
  close(): Promise<void>;
}
