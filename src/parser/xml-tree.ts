/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import type { ParseTreeNode, Span } from '../engine/types';
import type { XmlTreeResult } from './types';

const POSITION_ATTRIBUTES = ['srow', 'scol', 'erow', 'ecol'] as const;

class DumpNode implements ParseTreeNode {
  readonly children: DumpNode[] = [];

  constructor(
    readonly name: string,
    readonly field: string | undefined,
    readonly parent: DumpNode | undefined,
    readonly span: Span,
  ) {}
}

function attributeText(value: string | sax.QualifiedAttribute | undefined): string | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : value.value;
}

/**
 * Read a parse tree dumped as XML, one element per node:
 *
 *   <module srow="0" scol="0" erow="2" ecol="0">
 *     <identifier field="name" srow="0" scol="6" erow="0" ecol="9"/>
 *     <node type=":" srow="0" scol="9" erow="0" ecol="10"/>
 *   </module>
 *
 * The element name is the node type unless a `type` attribute overrides it,
 * which is how punctuation node types are written. Text content is ignored.
 */
export function parseXmlTree(text: string): XmlTreeResult {
  const errors: XmlTreeResult['errors'] = [];
  const stack: DumpNode[] = [];
  let root: DumpNode | undefined;
  let nodeCount = 0;

  const parser = sax.parser(true, { trim: true });
  parser.onerror = (err: Error) => {
    errors.push({
      line: parser.line + 1,
      column: parser.column + 1,
      message: err.message.split('\n')[0],
    });
    parser.resume();
  };

  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    const attr = (key: string): string | undefined => attributeText(tag.attributes[key]);
    const position: Record<(typeof POSITION_ATTRIBUTES)[number], number> = { srow: 0, scol: 0, erow: 0, ecol: 0 };
    for (const key of POSITION_ATTRIBUTES) {
      const raw = attr(key);
      if (raw === undefined || !/^\d+$/.test(raw.trim())) {
        errors.push({
          line: parser.line + 1,
          column: parser.column + 1,
          message: raw === undefined
            ? `Element <${tag.name}> is missing attribute "${key}"`
            : `Attribute "${key}" of <${tag.name}> is not a number: "${raw}"`,
        });
        continue;
      }
      position[key] = Number(raw.trim());
    }

    const parent = stack.length > 0 ? stack[stack.length - 1] : undefined;
    const node = new DumpNode(
      attr('type') ?? tag.name,
      attr('field') || undefined,
      parent,
      {
        start: { row: position.srow, column: position.scol },
        end: { row: position.erow, column: position.ecol },
      },
    );
    nodeCount++;
    if (parent) parent.children.push(node);
    else if (!root) root = node;
    else {
      errors.push({
        line: parser.line + 1,
        column: parser.column + 1,
        message: `Multiple root elements: <${tag.name}> ignored`,
      });
    }
    stack.push(node);
  };

  parser.onclosetag = () => {
    stack.pop();
  };

  parser.write(text).close();

  return { root, nodeCount, errors };
}
