/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { parseXmlTree } from './xml-tree';
export { fromSyntaxNode } from './syntax-node';
export type { SyntaxNodeLike, XmlTreeResult } from './types';
