/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Inputs accepted as parse trees.
*/

import type { ParseTreeNode, Position } from '../engine/types';

/**
 * The subset of a tree-sitter syntax node the adapter reads. Both the
 * native and the wasm bindings expose these members.
 */
export interface SyntaxNodeLike {
  readonly type: string;
  readonly startPosition: Position;
  readonly endPosition: Position;
  readonly childCount: number;
  child(index: number): SyntaxNodeLike | null;
  /** Field under which the child at `index` appears, if any. */
  fieldNameForChild(index: number): string | null | undefined;
}

/**
 * Result of reading an XML parse-tree dump.
 */
export interface XmlTreeResult {
  /** Root of the tree, or undefined when the document has no element. */
  root: ParseTreeNode | undefined;
  /** Number of parse-tree nodes read. */
  nodeCount: number;
  /** Problems found (1-based line and column). */
  errors: Array<{ line: number; column: number; message: string }>;
}
