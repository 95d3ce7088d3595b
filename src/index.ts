/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Tree-shape syntax highlighting: compile ancestor-chain rules into a match
  tree and resolve highlight labels for the nodes of a parse tree.
*/

export * from './engine';
export * from './rules';
export * from './parser';
export { HighlightEngine, createHighlightEngine } from './service/highlight-engine';
export type { RebuildResult } from './service/highlight-engine';
export { resolveSettings, DEFAULT_SETTINGS } from './config';
export type { EngineSettings, ResolvedSettings } from './config';
export { ConsoleLogger } from './common/console-logger';
export { LOG_LEVELS, isLogLevel } from './common/logger';
export type { Logger, LogLevel } from './common/logger';
