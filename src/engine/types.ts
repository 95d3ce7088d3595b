/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Data model shared by the match-tree builder and the matcher.
*/

/** Zero-based row/column position in the source document. */
export interface Position {
  row: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
}

/**
 * Shape of one syntax-tree node: the parser's node type plus the field
 * (role in its parent) when the parent assigns one.
 */
export interface NodeDescriptor {
  name: string;
  field?: string;
}

/** Lookup key derived from a descriptor, see `choiceKey`. */
export type ChoiceKey = string;

/**
 * One ancestor chain, outermost ancestor first and the node that triggers
 * the match last.
 */
export interface Rule {
  path: NodeDescriptor[];
  label: string;
}

export interface MatchNode {
  /** Set when some rule ends exactly at this node. */
  readonly label?: string;
  /** Children keyed by the choice key of the next (outer) ancestor. */
  readonly choices: ReadonlyMap<ChoiceKey, MatchNode>;
}

/**
 * Compiled rule set. The root has no label and one entry per distinct
 * innermost descriptor.
 */
export interface MatchTree {
  readonly root: MatchNode;
  /** Number of rules compiled into the tree (including overridden ones). */
  readonly ruleCount: number;
  /** Number of match nodes below the root. */
  readonly nodeCount: number;
}

/**
 * Read-only view of a node in the parse tree produced by the external
 * parser. `field` is the role of the node under its parent, if any.
 */
export interface ParseTreeNode {
  readonly name: string;
  readonly field?: string;
  readonly children: readonly ParseTreeNode[];
  readonly parent: ParseTreeNode | undefined;
  readonly span: Span;
}

export interface HighlightInstruction {
  span: Span;
  label: string;
}
