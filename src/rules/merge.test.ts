/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { mergeRuleSets, ruleKey } from './merge';
import { rule } from '../test/parse-tree';

describe('mergeRuleSets', () => {
  it('replaces labels in place and appends new paths', () => {
    const base = [rule('string', 'String'), rule('comment', 'Comment')];
    const override = [rule('decorator', 'Decorator'), rule('string', 'LightString')];
    expect(mergeRuleSets(base, override)).toEqual([
      rule('string', 'LightString'),
      rule('comment', 'Comment'),
      rule('decorator', 'Decorator'),
    ]);
  });

  it('treats qualified and bare descriptors as different paths', () => {
    const merged = mergeRuleSets([rule('function_definition name:identifier', 'FunctionName')], [
      rule('function_definition identifier', 'Identifier'),
    ]);
    expect(merged).toHaveLength(2);
  });

  it('does not share descriptors with its inputs', () => {
    const base = [rule('module string', 'DocString')];
    const merged = mergeRuleSets(base);
    merged[0].path[0].name = 'changed';
    expect(base[0].path[0].name).toBe('module');
  });
});

describe('ruleKey', () => {
  it('ignores the label', () => {
    expect(ruleKey(rule('call identifier', 'A'))).toBe(ruleKey(rule('call identifier', 'B')));
  });
  it('depends on order', () => {
    expect(ruleKey(rule('call identifier', 'A'))).not.toBe(ruleKey(rule('identifier call', 'A')));
  });
});
