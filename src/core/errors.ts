/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export class CompactLogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A malformed command-line value (range, option, missing argument). Raised
 * before any file is touched.
 */
export class ArgumentFormatError extends CompactLogError {}

/**
 * Split mode was requested but no usable keyword remained after trimming.
 */
export class EmptyKeywordListError extends CompactLogError {
  constructor() {
    super('No keywords provided for splitting.');
  }
}
