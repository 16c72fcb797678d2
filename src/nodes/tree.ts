/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { MACRO_KINDS } from './types';
import type { MacroNode, Node, NodeSelector, SelectedNode } from './types';

const NO_CHILDREN: readonly Node[] = Object.freeze([]);
const MACRO_KIND_SET: ReadonlySet<Node['kind']> = new Set(MACRO_KINDS);

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

/**
 * Child nodes in document order; empty for leaves.
 */
export function getChildren(node: Node): readonly Node[] {
  return 'children' in node ? node.children : NO_CHILDREN;
}

export function isMacroNode(node: Node): node is MacroNode {
  return MACRO_KIND_SET.has(node.kind);
}

/**
 * Block classification. Depends on the kind only (for breaks, on the break
 * type fixed at construction), never on content.
 */
export function isBlockLevel(node: Node): boolean {
  switch (node.kind) {
    case 'text-break':
      return node.breakType !== 'line-break';
    case 'heading':
    case 'list':
    case 'list-item':
    case 'decision-list':
    case 'decision-list-item':
    case 'table':
    case 'table-row':
    case 'table-cell':
    case 'layout':
    case 'layout-section':
    case 'layout-cell':
    case 'fragment':
    case 'panel-macro':
    case 'code-macro':
    case 'expand-macro':
    case 'details-macro':
    case 'toc-macro':
    case 'include-macro':
    case 'excerpt-include-macro':
    case 'tasks-report-macro':
    case 'attachments-macro':
    case 'view-pdf-macro':
    case 'view-file-macro':
    case 'excerpt-macro':
      return true;
    case 'text':
    case 'image':
    case 'emoticon':
    case 'time':
    case 'placeholder':
    case 'text-effect':
    case 'link':
    case 'resource-identifier':
    case 'status-macro':
    case 'jira-macro':
    case 'profile-macro':
    case 'anchor-macro':
    case 'container':
      return false;
    default:
      return assertNever(node, 'node kind');
  }
}

export function matchesSelector(node: Node, selector: NodeSelector): boolean {
  switch (selector) {
    case 'macro':
      return isMacroNode(node);
    case 'block':
      return isBlockLevel(node);
    case 'inline':
      return !isBlockLevel(node);
    default:
      return node.kind === selector;
  }
}

function* preOrder(node: Node): Generator<Node, void, undefined> {
  yield node;
  for (const child of getChildren(node)) {
    yield* preOrder(child);
  }
}

/**
 * Depth-first pre-order traversal starting with `node`. The returned iterable
 * is lazy and can be iterated any number of times.
 */
export function walk(node: Node): Iterable<Node> {
  return {
    [Symbol.iterator]: () => preOrder(node),
  };
}

/**
 * Nodes of the subtree matching one selector, in document order.
 */
export function findAllOf<S extends NodeSelector>(root: Node, selector: S): Array<SelectedNode<S>> {
  const found: Array<SelectedNode<S>> = [];
  for (const node of walk(root)) {
    if (isSelected(node, selector)) found.push(node);
  }
  return found;
}

/**
 * One bucket per selector, each in document order. A node matching several
 * selectors lands in every matching bucket.
 */
export function findAll<S extends NodeSelector>(root: Node, ...selectors: S[]): Array<Array<SelectedNode<S>>> {
  const nodes = [...walk(root)];
  return selectors.map((selector) =>
    nodes.filter((node): node is SelectedNode<S> => isSelected(node, selector))
  );
}

function isSelected<S extends NodeSelector>(node: Node, selector: S): node is SelectedNode<S> {
  return matchesSelector(node, selector);
}

/**
 * Freeze a freshly built node and its children array. Children are frozen
 * when they are built, so one level is enough.
 */
export function freezeNode<T extends Node>(node: T): T {
  if ('children' in node) Object.freeze(node.children);
  return Object.freeze(node);
}
