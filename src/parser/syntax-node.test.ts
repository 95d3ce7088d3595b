/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { fromSyntaxNode } from './syntax-node';
import type { SyntaxNodeLike } from './types';
import type { Position } from '../engine/types';
import { buildMatchTree } from '../engine/match-tree';
import { highlight } from '../engine/matcher';
import { rule } from '../test/parse-tree';

class FakeSyntaxNode implements SyntaxNodeLike {
  constructor(
    readonly type: string,
    readonly startPosition: Position,
    readonly endPosition: Position,
    private readonly kids: Array<{ field: string | null; node: FakeSyntaxNode | null }> = [],
  ) {}

  get childCount(): number {
    return this.kids.length;
  }

  child(index: number): FakeSyntaxNode | null {
    return index < this.kids.length ? this.kids[index].node : null;
  }

  fieldNameForChild(index: number): string | null {
    return index < this.kids.length ? this.kids[index].field : null;
  }
}

const at = (row: number, column: number): Position => ({ row, column });

// def f(): pass
const source = new FakeSyntaxNode('module', at(0, 0), at(1, 0), [
  {
    field: null,
    node: new FakeSyntaxNode('function_definition', at(0, 0), at(0, 13), [
      { field: null, node: new FakeSyntaxNode('def', at(0, 0), at(0, 3)) },
      { field: 'name', node: new FakeSyntaxNode('identifier', at(0, 4), at(0, 5)) },
      { field: 'parameters', node: new FakeSyntaxNode('parameters', at(0, 5), at(0, 7)) },
      { field: null, node: null },
      { field: 'body', node: new FakeSyntaxNode('block', at(0, 9), at(0, 13)) },
    ]),
  },
]);

describe('fromSyntaxNode', () => {
  it('exposes type, field, parent and span', () => {
    const root = fromSyntaxNode(source);
    expect(root.name).toBe('module');
    expect(root.field).toBeUndefined();
    expect(root.parent).toBeUndefined();
    const fn = root.children[0];
    expect(fn.parent).toBe(root);
    expect(fn.children.map((c) => `${c.field ?? ''}/${c.name}`)).toEqual([
      '/def',
      'name/identifier',
      'parameters/parameters',
      'body/block',
    ]);
    expect(fn.children[1].span).toEqual({ start: at(0, 4), end: at(0, 5) });
  });

  it('wraps children once', () => {
    const root = fromSyntaxNode(source);
    expect(root.children).toBe(root.children);
    expect(root.children[0].children[1]).toBe(root.children[0].children[1]);
  });

  it('can be highlighted', () => {
    const matchTree = buildMatchTree([
      rule('function_definition def', 'Function'),
      rule('function_definition name:identifier', 'FunctionName'),
    ]);
    expect(highlight(fromSyntaxNode(source), matchTree)).toEqual([
      { span: { start: at(0, 0), end: at(0, 3) }, label: 'Function' },
      { span: { start: at(0, 4), end: at(0, 5) }, label: 'FunctionName' },
    ]);
  });
});
