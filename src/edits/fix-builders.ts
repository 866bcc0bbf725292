import type { types } from 'estree-toolkit';

import { InvalidEditError } from '../lib/errors';
import type { RefactorEdit, TextSpan } from '../types';
import { getNodeSpan } from './span';

function requireSpan(node: types.Node, builder: string): TextSpan {
  const span = getNodeSpan(node);
  if (!span) {
    throw new InvalidEditError(
      `${builder}: ${node.type} node has no source offsets to anchor an edit.`,
      { builder, nodeType: node.type }
    );
  }
  return span;
}

/**
 * Replaces the whole text of `node`.
 */
export function replaceNode(node: types.Node, replacement: string): RefactorEdit {
  return { span: requireSpan(node, 'replaceNode'), replacement };
}

/**
 * Removes the text of `node`. Surrounding whitespace and punctuation stay.
 */
export function deleteNode(node: types.Node): RefactorEdit {
  return { span: requireSpan(node, 'deleteNode'), replacement: '' };
}

/**
 * Inserts `text` immediately before `node`.
 */
export function prefixWith(node: types.Node, text: string): RefactorEdit {
  const { start } = requireSpan(node, 'prefixWith');
  return { span: { start, end: start }, replacement: text };
}

/**
 * Inserts `text` immediately after `node`.
 */
export function postfixWith(node: types.Node, text: string): RefactorEdit {
  const { end } = requireSpan(node, 'postfixWith');
  return { span: { start: end, end }, replacement: text };
}

/**
 * Replaces an arbitrary span. Bounds are checked when the edit is applied.
 */
export function replaceSpan(span: TextSpan, replacement: string): RefactorEdit {
  return { span: { start: span.start, end: span.end }, replacement };
}
