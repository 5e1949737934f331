/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Collapses runs of identical lines into `"<line> (xN)"`. Equality is on the
 * whole line, so lines that differ only in their timestamp stay separate.
 */
export class RepeatCollapser {
  private previous: string | undefined;
  private count = 0;

  /**
   * Adds the next line and returns the collapsed form of the run it ended, if any.
   */
  push(line: string): string | undefined {
    const text = line.replace(/\n+$/, '');
    if (this.previous !== undefined && text === this.previous) {
      this.count += 1;
      return undefined;
    }
    const emitted = this.render();
    this.previous = text;
    this.count = 1;
    return emitted;
  }

  finish(): string | undefined {
    const emitted = this.render();
    this.previous = undefined;
    this.count = 0;
    return emitted;
  }

  private render(): string | undefined {
    if (this.previous === undefined) {
      return undefined;
    }
    return this.count > 1 ? `${this.previous} (x${this.count})` : this.previous;
  }
}

/**
 * Standalone generic compaction over already filtered lines.
 */
export function* compactLines(lines: Iterable<string>): Generator<string> {
  const collapser = new RepeatCollapser();
  for (const line of lines) {
    const emitted = collapser.push(line);
    if (emitted !== undefined) {
      yield emitted;
    }
  }
  const last = collapser.finish();
  if (last !== undefined) {
    yield last;
  }
}
