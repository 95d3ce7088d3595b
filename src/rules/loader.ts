/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import { mergeRuleSets } from './merge';
import { parseRuleFile } from './rule-file';
import type { Rule } from '../engine/types';
import type { RuleFileError, RuleFileResult } from './types';

/**
 * Read and parse rule files in the given order. Rules from later files
 * override rules with the same path in earlier ones. A file that cannot be
 * read is reported as an error and contributes no rules.
 */
export function readRuleFiles(paths: readonly string[]): RuleFileResult {
  const sets: Rule[][] = [];
  const errors: RuleFileError[] = [];
  for (const filePath of paths) {
    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf8');
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      errors.push({ source: filePath, line: 0, column: 0, message: `Cannot read rule file: ${message}` });
      continue;
    }
    const result = parseRuleFile(text, filePath);
    sets.push(result.rules);
    errors.push(...result.errors);
  }
  return { rules: mergeRuleSets(...sets), errors };
}
