/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { parseRuleFile } from './rule-file';
export { readRuleFiles } from './loader';
export { mergeRuleSets, ruleKey } from './merge';
export { isRuleFileUsable, formatRuleDiagnostics } from './diagnostics';
export type { RuleFileError, RuleFileResult } from './types';
