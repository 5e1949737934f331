/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_PROGRESS_INTERVAL } from '../runner/compact-log.js';

export type UiMode = 'ink' | 'plain';

export interface RuntimeConfig {
  ui: UiMode;
  progressInterval: number;
}

export function resolveRuntimeConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  isTty: boolean = Boolean(process.stdout.isTTY),
): RuntimeConfig {
  const requestedUi = env['COMPACT_LOG_UI']?.trim().toLowerCase();
  const ui: UiMode =
    requestedUi === 'ink' || requestedUi === 'plain' ? requestedUi : isTty ? 'ink' : 'plain';

  const interval = Number(env['COMPACT_LOG_PROGRESS_INTERVAL']);
  const progressInterval =
    Number.isInteger(interval) && interval > 0 ? interval : DEFAULT_PROGRESS_INTERVAL;

  return { ui, progressInterval };
}
