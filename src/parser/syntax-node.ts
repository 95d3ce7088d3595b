/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { ParseTreeNode, Span } from '../engine/types';
import type { SyntaxNodeLike } from './types';

class SyntaxNodeView implements ParseTreeNode {
  readonly name: string;
  readonly field: string | undefined;
  readonly span: Span;
  private cachedChildren: SyntaxNodeView[] | undefined;

  constructor(
    private readonly node: SyntaxNodeLike,
    field: string | null | undefined,
    readonly parent: SyntaxNodeView | undefined,
  ) {
    this.name = node.type;
    this.field = field || undefined;
    this.span = {
      start: { row: node.startPosition.row, column: node.startPosition.column },
      end: { row: node.endPosition.row, column: node.endPosition.column },
    };
  }

  get children(): readonly SyntaxNodeView[] {
    if (!this.cachedChildren) {
      const children: SyntaxNodeView[] = [];
      for (let i = 0; i < this.node.childCount; i++) {
        const child = this.node.child(i);
        if (child) children.push(new SyntaxNodeView(child, this.node.fieldNameForChild(i), this));
      }
      this.cachedChildren = children;
    }
    return this.cachedChildren;
  }
}

/**
 * Present a tree-sitter node (normally `tree.rootNode`) as a parse tree.
 * Children are wrapped on first access, each carrying the field name its
 * parent assigns it.
 */
export function fromSyntaxNode(node: SyntaxNodeLike): ParseTreeNode {
  return new SyntaxNodeView(node, undefined, undefined);
}
