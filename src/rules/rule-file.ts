/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Reader for indentation-nested rule text, e.g.

    class_definition
        class             Class
        name:identifier   ClassName
        block
            expression_statement
                string    DocString

  Each labelled line yields one rule made of its enclosing lines followed by
  itself.
*/

import { parseDescriptor } from '../engine/choice-key';
import type { NodeDescriptor, Rule } from '../engine/types';
import { mergeRuleSets } from './merge';
import type { RuleFileError, RuleFileResult } from './types';

interface OpenLine {
  indent: number;
  descriptor: NodeDescriptor;
  label?: string;
  line: number;
  hasChildren: boolean;
}

/** Remove a `#` comment: at line start or preceded by whitespace. */
function stripComment(text: string): string {
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '#' && (i === 0 || /\s/.test(text[i - 1]))) {
      return text.slice(0, i);
    }
  }
  return text;
}

/**
 * Parse rule text into a flat rule list. Parsing continues past errors so
 * that all of them are reported; rules from well-formed lines are still
 * returned. Later rules with the same path replace earlier ones.
 */
export function parseRuleFile(text: string, source = '<input>'): RuleFileResult {
  const rules: Rule[] = [];
  const errors: RuleFileError[] = [];
  const stack: OpenLine[] = [];

  const report = (line: number, column: number, message: string): void => {
    errors.push({ source, line, column, message });
  };

  const close = (entry: OpenLine): void => {
    if (entry.label === undefined && !entry.hasChildren) {
      report(entry.line, entry.indent + 1, `"${entry.descriptor.name}" has no label and no nested rules`);
    }
  };

  const lines = text.split(/\r?\n/);
  lines.forEach((raw, idx) => {
    const lineNo = idx + 1;
    const content = stripComment(raw).trimEnd();
    if (content.trim() === '') return;

    const indentText = /^[ \t]*/.exec(content)?.[0] ?? '';
    const tab = indentText.indexOf('\t');
    if (tab >= 0) {
      report(lineNo, tab + 1, 'Tabs are not allowed in indentation');
      return;
    }
    const indent = indentText.length;

    const tokens: string[] = [];
    const offsets: number[] = [];
    const tokenPattern = /\S+/g;
    let match: RegExpExecArray | null;
    while ((match = tokenPattern.exec(content)) !== null) {
      tokens.push(match[0]);
      offsets.push(match.index);
    }
    if (tokens.length > 2) {
      report(lineNo, offsets[2] + 1, `Unexpected text "${tokens[2]}" after label`);
      return;
    }
    // `name+` repeats are not supported; punctuation names such as `+` and `++` are
    if (/\w\+$/.test(tokens[0])) {
      report(lineNo, indent + 1, `Repeat marker "+" is not supported: "${tokens[0]}"`);
      return;
    }

    let lastClosed: OpenLine | undefined;
    while (stack.length > 0 && stack[stack.length - 1].indent >= indent) {
      lastClosed = stack.pop();
      if (lastClosed) close(lastClosed);
    }
    if (stack.length === 0 && indent !== 0) {
      report(lineNo, indent + 1, 'Unexpected indentation');
      return;
    }
    if (lastClosed && lastClosed.indent !== indent) {
      report(lineNo, indent + 1, 'Indentation does not match any enclosing level');
      return;
    }

    if (stack.length > 0) stack[stack.length - 1].hasChildren = true;
    const entry: OpenLine = {
      indent,
      descriptor: parseDescriptor(tokens[0]),
      line: lineNo,
      hasChildren: false,
    };
    if (tokens.length === 2) entry.label = tokens[1];
    stack.push(entry);

    if (entry.label !== undefined) {
      rules.push({ path: stack.map((open) => ({ ...open.descriptor })), label: entry.label });
    }
  });

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry) close(entry);
  }

  errors.sort((a, b) => a.line - b.line || a.column - b.column);
  return { rules: mergeRuleSets(rules), errors };
}
