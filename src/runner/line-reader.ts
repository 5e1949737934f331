/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable } from 'node:stream';
import { TextDecoder } from 'node:util';
import { hasTimestampBounds, isIncluded, isPastLineRange } from '../core/range.js';
import { firstNumericToken } from '../core/timestamp.js';
import type { RangeBounds, SourceLine } from '../core/types.js';

/**
 * Streams a log source line by line, numbering from 1. Unlike readline this
 * keeps track of whether the final line was newline-terminated, so copied
 * output stays byte-identical. CRLF and a lone CR are both read as LF.
 * Buffers must hold valid UTF-8; a malformed sequence rejects with a
 * `TypeError`.
 *
 * @param input - Readable producing strings or UTF-8 buffers
 * @yields One entry per line, empty lines included
 */
export async function* streamSourceLines(input: Readable): AsyncGenerator<SourceLine> {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  const lineBreak = /\r\n|\r|\n/g;
  let pending = '';
  let lineNumber = 0;

  const chunks: AsyncIterable<string | Buffer> = input;
  for await (const chunk of chunks) {
    pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    let cursor = 0;
    lineBreak.lastIndex = 0;
    for (let match = lineBreak.exec(pending); match; match = lineBreak.exec(pending)) {
      // A trailing CR may be the first half of a CRLF split across chunks.
      if (match[0] === '\r' && match.index === pending.length - 1) {
        break;
      }
      lineNumber += 1;
      yield { raw: pending.slice(cursor, match.index), lineNumber, hasNewline: true };
      cursor = match.index + match[0].length;
    }
    pending = pending.slice(cursor);
  }

  pending += decoder.decode();
  if (pending.endsWith('\r')) {
    lineNumber += 1;
    yield { raw: pending.slice(0, -1), lineNumber, hasNewline: true };
  } else if (pending.length > 0) {
    lineNumber += 1;
    yield { raw: pending, lineNumber, hasNewline: false };
  }
}

/**
 * Yields the lines that pass the range bounds, judging timestamps by the
 * first whitespace-delimited numeric token. Stops reading once past the end
 * of the line range.
 */
export async function* filterSourceLines(
  lines: AsyncIterable<SourceLine>,
  bounds: RangeBounds,
): AsyncGenerator<SourceLine> {
  const checkTimestamps = hasTimestampBounds(bounds);
  for await (const line of lines) {
    if (isPastLineRange(line.lineNumber, bounds.lines)) {
      break;
    }
    const timestamp = checkTimestamps ? firstNumericToken(line.raw) : undefined;
    if (isIncluded(line.lineNumber, timestamp, bounds)) {
      yield line;
    }
  }
}
