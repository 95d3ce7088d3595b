/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { RuleFileError, RuleFileResult } from './types';

/**
 * Whether the rules may replace the active match tree. An empty but
 * error-free rule set is usable: it simply highlights nothing.
 */
export function isRuleFileUsable(result: RuleFileResult): boolean {
  return result.errors.length === 0;
}

/** One `source:line:column: message` line per error. */
export function formatRuleDiagnostics(errors: readonly RuleFileError[]): string[] {
  return errors.map((err) =>
    err.line > 0 ? `${err.source}:${err.line}:${err.column}: ${err.message}` : `${err.source}: ${err.message}`
  );
}
