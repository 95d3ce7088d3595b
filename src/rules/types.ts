/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Rule } from '../engine/types';

export interface RuleFileError {
  /** File path or other name of the rule text. */
  source: string;
  /** 1-based line; 0 when the error is not tied to a line (e.g. unreadable file). */
  line: number;
  /** 1-based column; 0 when not tied to a position. */
  column: number;
  message: string;
}

/**
 * Result of reading rule text: the flat rule list plus every problem found.
 */
export interface RuleFileResult {
  rules: Rule[];
  errors: RuleFileError[];
}
