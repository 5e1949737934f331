/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export * from './types/index.js';
export * from './runner/index.js';
export { resolveRuntimeConfigFromEnv, type RuntimeConfig, type UiMode } from './config/runtime-config.js';
export { main as runCli } from './cli/main.js';
