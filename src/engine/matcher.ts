/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { lookupChoice } from './choice-key';
import type { HighlightInstruction, MatchTree, ParseTreeNode, Span } from './types';

/**
 * Label for a single parse-tree node, or undefined when no rule applies.
 *
 * The node's own descriptor selects an entry below the root; from there the
 * node's ancestors are consumed one by one for as long as the match tree
 * has a matching choice. The label of the deepest labelled match node
 * reached wins.
 */
export function resolveLabel(node: ParseTreeNode, matchTree: MatchTree): string | undefined {
  let current = lookupChoice(matchTree.root, node);
  if (!current) return undefined;

  let best = current.label;
  let cursor = node.parent;
  while (cursor) {
    const next = lookupChoice(current, cursor);
    if (!next) break;
    current = next;
    if (current.label !== undefined) best = current.label;
    cursor = cursor.parent;
  }
  return best;
}

/**
 * Walk the whole parse tree in pre-order and return one instruction per
 * node that resolves to a label. The span is always the triggering node's
 * own span.
 */
export function highlight(tree: ParseTreeNode, matchTree: MatchTree): HighlightInstruction[] {
  const instructions: HighlightInstruction[] = [];
  const stack: ParseTreeNode[] = [tree];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    const label = resolveLabel(node, matchTree);
    if (label !== undefined) instructions.push({ span: node.span, label });
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return instructions;
}

/** Spans per label, in instruction order. */
export function groupByLabel(instructions: readonly HighlightInstruction[]): Map<string, Span[]> {
  const groups = new Map<string, Span[]>();
  for (const { span, label } of instructions) {
    const spans = groups.get(label);
    if (spans) spans.push(span);
    else groups.set(label, [span]);
  }
  return groups;
}
