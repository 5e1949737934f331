/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ArgumentFormatError } from '../core/errors.js';
import { UNBOUNDED } from '../core/range.js';
import { parseFloatToken } from '../core/timestamp.js';
import type { LineRange, RangeBounds, TimestampRange } from '../core/types.js';

export const USAGE =
  'usage: compact-log [-h] -o OUTPUT [-c] [-s SPLIT] [-l LINE_RANGE] [-t TIMESTAMP_RANGE] [-i] log';

export const HELP_TEXT = `${USAGE}

Process and compact log files, optionally split by keywords and line or timestamp ranges.

positional arguments:
  log                   Input log file path

options:
  -h, --help            Show this help message and exit
  -o, --output OUTPUT   Output file path or base name for split logs
  -c, --compact         Enable compacting repeated lines
  -s, --split SPLIT     Comma-separated keywords to split log by
  -l, --line-range LINE_RANGE
                        Line number range to process (e.g. 100-200)
  -t, --timestamp-range TIMESTAMP_RANGE
                        Timestamp range to process (e.g. 100026.000-100050.500)
  -i, --interactive     Prompt for any of the above before running`;

export const LINE_RANGE_MESSAGE =
  'Line range must be in format start-end with start <= end and both >=1';
export const TIMESTAMP_RANGE_MESSAGE =
  'Timestamp range must be in format start-end with start <= end, e.g. 100026.000-100050.500';

export interface CliOptions {
  inputPath: string;
  outputPath: string;
  compact: boolean;
  /** Unset when splitting was not requested. */
  keywords?: string[];
  lineRange?: LineRange;
  timestampRange?: TimestampRange;
  interactive: boolean;
  help: boolean;
}

const INTEGER = /^\+?\d+$/;

export const parseLineRange = (value: string): LineRange => {
  const parts = value.split('-').map((part) => part.trim());
  if (parts.length !== 2 || !parts.every((part) => INTEGER.test(part))) {
    throw new ArgumentFormatError(LINE_RANGE_MESSAGE);
  }
  const [start, end] = parts.map(Number);
  if (start < 1 || end < start) {
    throw new ArgumentFormatError(LINE_RANGE_MESSAGE);
  }
  return { start, end };
};

export const parseTimestampRange = (value: string): Required<TimestampRange> => {
  const parts = value.split('-');
  if (parts.length !== 2) {
    throw new ArgumentFormatError(TIMESTAMP_RANGE_MESSAGE);
  }
  const start = parseFloatToken(parts[0]);
  const end = parseFloatToken(parts[1]);
  if (start === undefined || end === undefined || start > end) {
    throw new ArgumentFormatError(TIMESTAMP_RANGE_MESSAGE);
  }
  return { start, end };
};

/**
 * Splits a comma-separated keyword list. Entries are trimmed; empty entries
 * and repeats are dropped, keeping the first occurrence's position.
 */
export const parseKeywordList = (value: string): string[] => [
  ...new Set(
    value
      .split(',')
      .map((keyword) => keyword.trim())
      .filter((keyword) => keyword.length > 0),
  ),
];

export const toRangeBounds = (options: Pick<CliOptions, 'lineRange' | 'timestampRange'>): RangeBounds => ({
  lines: options.lineRange ?? UNBOUNDED.lines,
  timestamps: options.timestampRange ?? UNBOUNDED.timestamps,
});

export const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = {
    inputPath: '',
    outputPath: '',
    compact: false,
    interactive: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const equals = token.startsWith('--') ? token.indexOf('=') : -1;
    const arg = equals === -1 ? token : token.slice(0, equals);
    const takeValue = (): string => {
      if (equals !== -1) {
        return token.slice(equals + 1);
      }
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ArgumentFormatError(`argument ${arg}: expected one argument`);
      }
      i += 1;
      return next;
    };

    switch (arg) {
      case '--output':
      case '-o':
        options.outputPath = takeValue();
        break;
      case '--compact':
      case '-c':
        options.compact = true;
        break;
      case '--split':
      case '-s': {
        const value = takeValue();
        // An empty value leaves splitting off, as if the option were absent.
        options.keywords = value.length > 0 ? parseKeywordList(value) : undefined;
        break;
      }
      case '--line-range':
      case '-l':
        options.lineRange = withArgumentName('-l/--line-range', () => parseLineRange(takeValue()));
        break;
      case '--timestamp-range':
      case '-t':
        options.timestampRange = withArgumentName('-t/--timestamp-range', () =>
          parseTimestampRange(takeValue()),
        );
        break;
      case '--interactive':
      case '-i':
        options.interactive = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new ArgumentFormatError(`unrecognized arguments: ${token}`);
        }
        if (options.inputPath) {
          throw new ArgumentFormatError(`unrecognized arguments: ${token}`);
        }
        options.inputPath = token;
    }
  }

  return options;
};

/**
 * Fails when a required argument is still missing (after any interactive setup).
 */
export const assertRequiredArguments = (options: CliOptions): void => {
  const missing = [
    options.outputPath ? undefined : '-o/--output',
    options.inputPath ? undefined : 'log',
  ].filter((name): name is string => name !== undefined);
  if (missing.length > 0) {
    throw new ArgumentFormatError(`the following arguments are required: ${missing.join(', ')}`);
  }
};

const withArgumentName = <T>(name: string, parse: () => T): T => {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ArgumentFormatError && !error.message.startsWith('argument ')) {
      throw new ArgumentFormatError(`argument ${name}: ${error.message}`);
    }
    throw error;
  }
};
