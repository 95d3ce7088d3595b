/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { parseXmlTree } from './xml-tree';
import { buildMatchTree } from '../engine/match-tree';
import { highlight } from '../engine/matcher';
import { rule } from '../test/parse-tree';

// class Foo:
//     """Doc."""
const classDump = `<?xml version="1.0"?>
<module srow="0" scol="0" erow="2" ecol="0">
  <class_definition srow="0" scol="0" erow="1" ecol="14">
    <class srow="0" scol="0" erow="0" ecol="5"/>
    <identifier field="name" srow="0" scol="6" erow="0" ecol="9"/>
    <node type=":" srow="0" scol="9" erow="0" ecol="10"/>
    <block field="body" srow="1" scol="4" erow="1" ecol="14">
      <expression_statement srow="1" scol="4" erow="1" ecol="14">
        <string srow="1" scol="4" erow="1" ecol="14">
          <string_start srow="1" scol="4" erow="1" ecol="7"/>
          <string_content srow="1" scol="7" erow="1" ecol="11">Doc.</string_content>
          <string_end srow="1" scol="11" erow="1" ecol="14"/>
        </string>
      </expression_statement>
    </block>
  </class_definition>
</module>`;

describe('parseXmlTree', () => {
  it('reads nodes, fields and spans', () => {
    const result = parseXmlTree(classDump);
    expect(result.errors).toEqual([]);
    expect(result.nodeCount).toBe(11);
    const root = result.root;
    expect(root?.name).toBe('module');
    expect(root?.parent).toBeUndefined();
    const classDef = root?.children[0];
    expect(classDef?.children.map((c) => c.name)).toEqual(['class', 'identifier', ':', 'block']);
    expect(classDef?.children.map((c) => c.field)).toEqual([undefined, 'name', undefined, 'body']);
    expect(classDef?.children[1].span).toEqual({ start: { row: 0, column: 6 }, end: { row: 0, column: 9 } });
    expect(classDef?.children[3].parent).toBe(classDef);
  });

  it('feeds the matcher end to end', () => {
    const { root } = parseXmlTree(classDump);
    const matchTree = buildMatchTree([
      rule('class_definition class', 'Class'),
      rule('class_definition name:identifier', 'ClassName'),
      rule('class_definition block expression_statement string', 'DocString'),
    ]);
    expect(root && highlight(root, matchTree)).toEqual([
      { span: { start: { row: 0, column: 0 }, end: { row: 0, column: 5 } }, label: 'Class' },
      { span: { start: { row: 0, column: 6 }, end: { row: 0, column: 9 } }, label: 'ClassName' },
      { span: { start: { row: 1, column: 4 }, end: { row: 1, column: 14 } }, label: 'DocString' },
    ]);
  });

  it('reports a missing position attribute', () => {
    const result = parseXmlTree('<module srow="0" scol="0" erow="0"/>');
    expect(result.errors.map((e) => e.message)).toEqual(['Element <module> is missing attribute "ecol"']);
    expect(result.root?.span.end).toEqual({ row: 0, column: 0 });
  });

  it('reports a non-numeric position attribute on its line', () => {
    const result = parseXmlTree(
      '<module srow="0" scol="0" erow="1" ecol="0">\n  <identifier srow="x" scol="0" erow="0" ecol="3"/>\n</module>'
    );
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].line).toBe(2);
    expect(result.errors[0].message).toBe('Attribute "srow" of <identifier> is not a number: "x"');
  });

  it('reports malformed XML', () => {
    const result = parseXmlTree('<module srow="0" scol="0" erow="0" ecol="1">');
    expect(result.errors.map((e) => e.message)).toContain('Unclosed root tag');
  });

  it('reports a second top-level element and keeps the first as root', () => {
    const result = parseXmlTree(
      '<module srow="0" scol="0" erow="0" ecol="1"/>\n<program srow="1" scol="0" erow="1" ecol="1"/>'
    );
    expect(result.root?.name).toBe('module');
    expect(result.errors.map((e) => e.message)).toContain('Multiple root elements: <program> ignored');
  });

  it('returns no root for an empty document', () => {
    const result = parseXmlTree('');
    expect(result.root).toBeUndefined();
    expect(result.nodeCount).toBe(0);
  });
});
