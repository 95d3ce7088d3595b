/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { choiceKey, descriptorFromKey, formatDescriptor } from './choice-key';
import type { ChoiceKey, MatchNode, MatchTree, Rule } from './types';

/**
 * Raised when a rule cannot be compiled. `index` is the position of the
 * offending rule in the input list.
 */
export class RuleError extends Error {
  constructor(
    message: string,
    public readonly index: number,
    public readonly label: string,
  ) {
    super(message);
    this.name = 'RuleError';
  }
}

interface BuildNode {
  label?: string;
  choices: Map<ChoiceKey, BuildNode>;
}

function newNode(): BuildNode {
  return { choices: new Map() };
}

/**
 * Compile rules into a match tree.
 *
 * Each rule's path is inserted innermost descriptor first, so the root is
 * keyed by the node that triggers a match and each level below it by the
 * next ancestor outwards. The label goes on the node reached by the
 * outermost ancestor. When two rules share the same path the later label
 * replaces the earlier one.
 *
 * @throws RuleError if any rule has an empty path; nothing is built in that case.
 */
export function buildMatchTree(rules: readonly Rule[]): MatchTree {
  rules.forEach((rule, index) => {
    if (rule.path.length === 0) {
      throw new RuleError(`Rule ${index} (${rule.label}) has an empty node path`, index, rule.label);
    }
  });

  const root = newNode();
  let nodeCount = 0;
  for (const rule of rules) {
    let node = root;
    for (let i = rule.path.length - 1; i >= 0; i--) {
      const key = choiceKey(rule.path[i]);
      let next = node.choices.get(key);
      if (!next) {
        next = newNode();
        node.choices.set(key, next);
        nodeCount++;
      }
      node = next;
    }
    node.label = rule.label;
  }

  return { root, ruleCount: rules.length, nodeCount };
}

/**
 * Indented listing of the tree, one match node per line, children sorted by
 * key. Labelled nodes show `-> Label`.
 */
export function dumpMatchTree(tree: MatchTree): string {
  const lines: string[] = [];
  const walk = (node: MatchNode, depth: number): void => {
    const keys = [...node.choices.keys()].sort();
    for (const key of keys) {
      const child = node.choices.get(key);
      if (!child) continue;
      const text = '  '.repeat(depth) + formatDescriptor(descriptorFromKey(key));
      lines.push(child.label !== undefined ? `${text} -> ${child.label}` : text);
      walk(child, depth + 1);
    }
  };
  walk(tree.root, 0);
  return lines.join('\n');
}
