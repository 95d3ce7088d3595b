/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { ChoiceKey, MatchNode, NodeDescriptor } from './types';

// NUL cannot occur in a node-type name, so qualified keys never collide
// with plain names such as ":" or "::".
const FIELD_SEPARATOR = '\u0000';

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Build a descriptor, treating an empty or null field as absent. */
export function descriptor(name: string, field?: string | null): NodeDescriptor {
  return field ? { name, field } : { name };
}

/** Key for the descriptor exactly as given (qualified when it has a field). */
export function choiceKey(d: NodeDescriptor): ChoiceKey {
  return d.field ? d.field + FIELD_SEPARATOR + d.name : d.name;
}

/**
 * Find the child of `node` chosen by `d`. The qualified key is used when
 * present; otherwise the bare name. Only one of the two is ever taken.
 */
export function lookupChoice(node: MatchNode, d: NodeDescriptor): MatchNode | undefined {
  if (d.field) {
    const qualified = node.choices.get(choiceKey(d));
    if (qualified) return qualified;
  }
  return node.choices.get(d.name);
}

/** Inverse of `choiceKey`. */
export function descriptorFromKey(key: ChoiceKey): NodeDescriptor {
  const idx = key.indexOf(FIELD_SEPARATOR);
  if (idx < 0) return { name: key };
  return { field: key.slice(0, idx), name: key.slice(idx + 1) };
}

/** Render as `field:name` or `name`. */
export function formatDescriptor(d: NodeDescriptor): string {
  return d.field ? `${d.field}:${d.name}` : d.name;
}

/**
 * Parse `field:name` or `name`. The text before the first colon only counts
 * as a field when it is an identifier and something follows the colon, so
 * punctuation node types like ":" or "::" stay plain names.
 */
export function parseDescriptor(text: string): NodeDescriptor {
  const idx = text.indexOf(':');
  if (idx > 0 && idx < text.length - 1) {
    const field = text.slice(0, idx);
    if (FIELD_NAME.test(field)) return { field, name: text.slice(idx + 1) };
  }
  return { name: text };
}
