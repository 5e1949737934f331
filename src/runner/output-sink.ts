/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { once } from 'node:events';
import { promises as fs, type WriteStream } from 'node:fs';
import { dirname } from 'node:path';
import type { LineSink } from '../core/types.js';

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const ensureParentDirectory = async (filePath: string): Promise<void> => {
  const directory = dirname(filePath);
  if (directory && directory !== '.') {
    await ensureDirectory(directory);
  }
};

/**
 * Truncating file writer that honours stream back-pressure. Write errors
 * surface on the next `write` or on `close`.
 */
export class FileLineSink implements LineSink {
  private failure: Error | undefined;
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly stream: WriteStream,
  ) {
    stream.on('error', (error: Error) => {
      this.failure = error;
    });
  }

  /**
   * Creates missing parent directories, then opens (and truncates) the file.
   * Open errors reject here rather than on first write.
   */
  static async open(filePath: string): Promise<FileLineSink> {
    await ensureParentDirectory(filePath);
    const handle = await fs.open(filePath, 'w');
    return new FileLineSink(filePath, handle.createWriteStream({ encoding: 'utf8' }));
  }

  async write(text: string): Promise<void> {
    this.throwIfFailed();
    if (!this.stream.write(text)) {
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.failure) {
      this.stream.destroy();
      this.throwIfFailed();
    }
    await new Promise<void>((resolve, reject) => {
      this.stream.end((error?: Error | null) => (error ? reject(error) : resolve()));
    });
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

/**
 * Closes every sink, then rethrows the first close failure, if any.
 */
export const closeAll = async (sinks: Iterable<LineSink>): Promise<void> => {
  const results = await Promise.allSettled([...sinks].map((sink) => sink.close()));
  const rejected = results.find(
    (result): result is PromiseRejectedResult => result.status === 'rejected',
  );
  if (rejected) {
    throw rejected.reason;
  }
};
