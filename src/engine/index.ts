/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { buildMatchTree, dumpMatchTree, RuleError } from './match-tree';
export { highlight, resolveLabel, groupByLabel } from './matcher';
export {
  descriptor,
  choiceKey,
  lookupChoice,
  descriptorFromKey,
  formatDescriptor,
  parseDescriptor,
} from './choice-key';
export type {
  Position,
  Span,
  NodeDescriptor,
  ChoiceKey,
  Rule,
  MatchNode,
  MatchTree,
  ParseTreeNode,
  HighlightInstruction,
} from './types';
