/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { choiceKey } from '../engine/choice-key';
import type { Rule } from '../engine/types';

/** Identity of a rule: its full descriptor sequence. */
export function ruleKey(rule: Rule): string {
  return rule.path.map(choiceKey).join('\n');
}

/**
 * Merge rule lists, later lists overriding earlier ones. A rule whose path
 * is already present replaces that rule's label in place; new paths are
 * appended in order.
 */
export function mergeRuleSets(...sets: ReadonlyArray<readonly Rule[]>): Rule[] {
  const merged: Rule[] = [];
  const indexByKey = new Map<string, number>();
  for (const set of sets) {
    for (const rule of set) {
      const key = ruleKey(rule);
      const copy: Rule = { path: rule.path.map((d) => ({ ...d })), label: rule.label };
      const existing = indexByKey.get(key);
      if (existing === undefined) {
        indexByKey.set(key, merged.length);
        merged.push(copy);
      } else {
        merged[existing] = copy;
      }
    }
  }
  return merged;
}
