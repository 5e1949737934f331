/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import prompts from 'prompts';
import {
  parseKeywordList,
  parseLineRange,
  parseTimestampRange,
  type CliOptions,
} from './args.js';

const formatRange = (range?: { start?: number; end?: number }): string =>
  range && range.start !== undefined && range.end !== undefined ? `${range.start}-${range.end}` : '';

const validateWith =
  (parse: (value: string) => unknown) =>
  (value: string): true | string => {
    if (value.trim().length === 0) {
      return true;
    }
    try {
      parse(value.trim());
      return true;
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  };

export async function runInteractiveSetup(options: CliOptions): Promise<void> {
  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'inputPath',
        message: 'Path to the log file to process',
        initial: options.inputPath,
      },
      {
        type: 'text',
        name: 'outputPath',
        message: 'Output file path (base name when splitting)',
        initial: options.outputPath,
      },
      {
        type: 'confirm',
        name: 'compact',
        message: 'Compact repeated lines?',
        initial: options.compact,
      },
      {
        type: 'text',
        name: 'split',
        message: 'Keywords to split by (comma-separated, empty for none)',
        initial: options.keywords?.join(', ') ?? '',
      },
      {
        type: 'text',
        name: 'lineRange',
        message: 'Line range start-end (empty for all lines)',
        initial: formatRange(options.lineRange),
        validate: validateWith(parseLineRange),
      },
      {
        type: 'text',
        name: 'timestampRange',
        message: 'Timestamp range start-end (empty for no limit)',
        initial: formatRange(options.timestampRange),
        validate: validateWith(parseTimestampRange),
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  if (typeof responses.inputPath === 'string' && responses.inputPath.trim()) {
    options.inputPath = responses.inputPath.trim();
  }
  if (typeof responses.outputPath === 'string' && responses.outputPath.trim()) {
    options.outputPath = responses.outputPath.trim();
  }
  if (typeof responses.compact === 'boolean') {
    options.compact = responses.compact;
  }
  if (typeof responses.split === 'string') {
    options.keywords = responses.split.trim() ? parseKeywordList(responses.split) : undefined;
  }
  if (typeof responses.lineRange === 'string') {
    options.lineRange = responses.lineRange.trim() ? parseLineRange(responses.lineRange.trim()) : undefined;
  }
  if (typeof responses.timestampRange === 'string') {
    options.timestampRange = responses.timestampRange.trim()
      ? parseTimestampRange(responses.timestampRange.trim())
      : undefined;
  }
}
