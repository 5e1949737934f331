/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { RepeatCollapser } from './repeat-collapser.js';
import type { LineSink, SourceLine } from './types.js';

export interface KeywordStream {
  keyword: string;
  sink: LineSink;
  /** Present only when the stream compacts its own repeats. */
  collapser?: RepeatCollapser;
  routed: number;
}

export interface KeywordSplitterOptions {
  compact: boolean;
}

/**
 * Routes each line to the first keyword it contains, in the order the keywords
 * were given. Lines matching no keyword are dropped.
 */
export class KeywordSplitter {
  private readonly streams: KeywordStream[];

  constructor(sinks: ReadonlyMap<string, LineSink>, options: KeywordSplitterOptions) {
    this.streams = [...sinks].map(([keyword, sink]) => ({
      keyword,
      sink,
      collapser: options.compact ? new RepeatCollapser() : undefined,
      routed: 0,
    }));
  }

  /**
   * Returns the number of records written for this line (0 or 1).
   */
  async accept(line: SourceLine): Promise<number> {
    const stream = this.streams.find(({ keyword }) => line.raw.includes(keyword));
    if (!stream) {
      return 0;
    }
    stream.routed += 1;
    if (!stream.collapser) {
      await stream.sink.write(line.hasNewline ? `${line.raw}\n` : line.raw);
      return 1;
    }
    const emitted = stream.collapser.push(line.raw);
    if (emitted === undefined) {
      return 0;
    }
    await stream.sink.write(`${emitted}\n`);
    return 1;
  }

  /**
   * Writes each stream's pending run. Returns the number of records written.
   */
  async flush(): Promise<number> {
    let written = 0;
    for (const stream of this.streams) {
      const emitted = stream.collapser?.finish();
      if (emitted !== undefined) {
        await stream.sink.write(`${emitted}\n`);
        written += 1;
      }
    }
    return written;
  }

  routedCounts(): Record<string, number> {
    return Object.fromEntries(this.streams.map(({ keyword, routed }) => [keyword, routed]));
  }
}
