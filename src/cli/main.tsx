/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import { resolveRuntimeConfigFromEnv } from '../config/runtime-config.js';
import { ArgumentFormatError, EmptyKeywordListError } from '../core/errors.js';
import { logConsole } from '../core/logging.js';
import { runCompactLog, type CompactLogOptions } from '../runner/index.js';
import { CompactLogApp } from '../ui/compact-log-app.js';
import {
  assertRequiredArguments,
  HELP_TEXT,
  parseArgs,
  toRangeBounds,
  USAGE,
  type CliOptions,
} from './args.js';
import { createConsoleObserver } from './console-observer.js';
import { runInteractiveSetup } from './interactive.js';

export const EXIT_OK = 0;
export const EXIT_USAGE = 2;

/**
 * Runs the CLI and resolves to the process exit code. Failures other than
 * argument errors reject.
 */
export const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
    if (options.help) {
      console.log(HELP_TEXT);
      return EXIT_OK;
    }
    if (options.interactive) {
      await runInteractiveSetup(options);
    }
    assertRequiredArguments(options);
  } catch (error) {
    if (error instanceof ArgumentFormatError) {
      console.error(`${USAGE}\ncompact-log: error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.keywords !== undefined && options.keywords.length === 0) {
    logConsole('warn', 'Split skipped', [['reason', new EmptyKeywordListError().message]]);
    return EXIT_OK;
  }

  const config = resolveRuntimeConfigFromEnv();
  const runOptions: CompactLogOptions = {
    inputPath: options.inputPath,
    outputPath: options.outputPath,
    compact: options.compact,
    keywords: options.keywords,
    bounds: toRangeBounds(options),
    progressInterval: config.progressInterval,
  };

  if (config.ui === 'ink') {
    const { waitUntilExit } = render(<CompactLogApp options={runOptions} />);
    await waitUntilExit();
  } else {
    await runCompactLog({ ...runOptions, observer: createConsoleObserver() });
  }
  return EXIT_OK;
};
