/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isIncluded } from './range.js';
import { extractTimestamp, formatTimestamp } from './timestamp.js';
import type { CompactRecord, LogLine, RangeBounds, SourceLine } from './types.js';

export const toLogLine = (source: SourceLine): LogLine => {
  const { timestamp, content } = extractTimestamp(source.raw);
  return { ...source, timestamp, content };
};

/**
 * Whole-file compaction. Consecutive lines with the same content (text minus
 * the embedded timestamp) form a group; the range filter is applied to each
 * member only when the group closes, so out-of-range lines never split a run.
 */
export class TimestampCompactor {
  private group: LogLine[] = [];

  constructor(private readonly bounds: RangeBounds) {}

  /**
   * Adds the next line and returns the record of the group it closed, if any.
   */
  push(line: LogLine): CompactRecord | undefined {
    const current = this.group[0];
    if (current !== undefined && current.content === line.content) {
      this.group.push(line);
      return undefined;
    }
    const record = this.flush();
    this.group = [line];
    return record;
  }

  finish(): CompactRecord | undefined {
    const record = this.flush();
    this.group = [];
    return record;
  }

  private flush(): CompactRecord | undefined {
    const survivors = this.group.filter((member) =>
      isIncluded(member.lineNumber, member.timestamp, this.bounds),
    );
    const [first] = survivors;
    if (first === undefined) {
      return undefined;
    }
    if (survivors.length === 1) {
      return { kind: 'line', line: first };
    }

    let firstTimestamp: number | undefined;
    let lastTimestamp: number | undefined;
    for (const { timestamp } of survivors) {
      if (timestamp === undefined) {
        continue;
      }
      firstTimestamp = firstTimestamp === undefined ? timestamp : Math.min(firstTimestamp, timestamp);
      lastTimestamp = lastTimestamp === undefined ? timestamp : Math.max(lastTimestamp, timestamp);
    }
    // No member with a timestamp leaves the span unset; the summary then drops it.
    return {
      kind: 'summary',
      content: first.content,
      count: survivors.length,
      firstTimestamp,
      lastTimestamp,
    };
  }
}

export const renderRecord = (record: CompactRecord): string => {
  if (record.kind === 'line') {
    return record.line.hasNewline ? `${record.line.raw}\n` : record.line.raw;
  }
  if (record.firstTimestamp === undefined || record.lastTimestamp === undefined) {
    return `${record.content} (x${record.count})\n`;
  }
  return `${record.content} (x${record.count}, TS: ${formatTimestamp(
    record.firstTimestamp,
  )}-${formatTimestamp(record.lastTimestamp)})\n`;
};

/**
 * Streams compaction records for a sequence of source lines.
 */
export async function* compactLogLines(
  lines: AsyncIterable<SourceLine>,
  bounds: RangeBounds,
): AsyncGenerator<CompactRecord> {
  const compactor = new TimestampCompactor(bounds);
  for await (const source of lines) {
    const record = compactor.push(toLogLine(source));
    if (record) {
      yield record;
    }
  }
  const last = compactor.finish();
  if (last) {
    yield last;
  }
}
