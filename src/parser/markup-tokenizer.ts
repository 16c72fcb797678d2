/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import type { MarkupElement, MarkupNode, TokenizeError, TokenizeResult } from './types';

const ROOT_TAG = 'storage-root';
const OPEN_ROOT = `<${ROOT_TAG}>`;
const CLOSE_ROOT = `</${ROOT_TAG}>`;
const RAW_NAME = /[^\s/>]+/y;

/** HTML elements that never take children, closed or not. */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

interface OpenElement {
  type: 'element';
  name: string;
  rawName: string;
  attributes: Record<string, string>;
  children: MarkupNode[];
  startOffset: number;
  endOffset: number;
}

function openElement(
  name: string,
  rawName: string,
  attributes: Record<string, string>,
  startOffset: number
): OpenElement {
  return {
    type: 'element',
    name,
    rawName,
    attributes,
    children: [],
    startOffset,
    endOffset: startOffset,
  };
}

function appendText(parent: OpenElement, value: string, cdata: boolean): void {
  const last = parent.children[parent.children.length - 1];
  if (last && last.type === 'text') {
    parent.children[parent.children.length - 1] = {
      type: 'text',
      value: last.value + value,
      cdata: last.cdata || cdata,
    };
    return;
  }
  parent.children.push({ type: 'text', value, cdata });
}

function firstLine(message: string): string {
  const newline = message.indexOf('\n');
  return newline >= 0 ? message.slice(0, newline) : message;
}

/**
 * Tokenize storage-format markup into a forest of generic elements.
 *
 * Uses sax in non-strict mode inside a synthetic root element, so that several
 * top-level siblings, HTML entities, unclosed elements and stray closing tags
 * are accepted. Tag and attribute names come out lower-cased; `rawName`
 * keeps the tag name as written. Only what sax cannot recover from (input
 * ending inside a tag, an attribute value, a comment or a CDATA section) and
 * the reserved wrapper name are reported in `errors`.
 */
export function tokenizeMarkup(markup: string): TokenizeResult {
  const errors: TokenizeError[] = [];
  const source = OPEN_ROOT + markup + CLOSE_ROOT;
  const root = openElement(ROOT_TAG, ROOT_TAG, {}, 0);
  const stack: OpenElement[] = [];
  let rootSeen = false;

  const toOffset = (position: number): number =>
    Math.min(Math.max(0, position - OPEN_ROOT.length), markup.length);
  const currentParent = (): OpenElement => stack[stack.length - 1] ?? root;

  const parser = sax.parser(false, { lowercase: true, position: true });
  const recordError = (message: string): void => {
    errors.push({
      line: parser.line,
      column: parser.line === 0 ? Math.max(0, parser.column - OPEN_ROOT.length) : parser.column,
      message: firstLine(message),
    });
  };

  parser.onerror = (err: Error) => {
    recordError(err.message);
  };

  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    if (!rootSeen) {
      rootSeen = true;
      stack.push(root);
      return;
    }
    const attrs: Record<string, string> = {};
    const rawAttributes: Record<string, string | sax.QualifiedAttribute> = tag.attributes;
    for (const [k, v] of Object.entries(rawAttributes)) {
      attrs[k] = typeof v === 'string' ? v : v.value;
    }
    if (tag.name === ROOT_TAG) recordError(`Reserved element name: ${ROOT_TAG}`);
    RAW_NAME.lastIndex = parser.startTagPosition;
    const rawName = RAW_NAME.exec(source)?.[0] ?? tag.name;
    const element = openElement(tag.name, rawName, attrs, toOffset(parser.startTagPosition - 1));
    currentParent().children.push(element);
    if (VOID_ELEMENTS.has(element.name)) {
      element.endOffset = toOffset(parser.position);
      return;
    }
    stack.push(element);
  };

  parser.onclosetag = (tagName: string) => {
    // Past this point sax would read the rest of the input as plain text.
    if (tagName === ROOT_TAG && parser.position < source.length) {
      recordError(`Reserved element name: ${ROOT_TAG}`);
    }
    if (VOID_ELEMENTS.has(tagName)) return;
    const element = stack.pop();
    if (element) element.endOffset = toOffset(parser.position);
  };

  parser.ontext = (t: string) => {
    appendText(currentParent(), t, false);
  };

  parser.oncdata = (cdata: string) => {
    appendText(currentParent(), cdata, true);
  };

  parser.onscript = (script: string) => {
    appendText(currentParent(), script, false);
  };

  try {
    parser.write(source).close();
  } catch (err) {
    // sax rethrows a recorded error on the next write; only record fresh ones.
    if (errors.length === 0) recordError(err instanceof Error ? err.message : String(err));
  }

  for (const element of stack) element.endOffset = markup.length;

  const nodes: MarkupNode[] = root.children;
  return { nodes, errors };
}

/** Concatenated text of all descendant text runs. */
export function textContent(element: MarkupElement): string {
  let text = '';
  for (const child of element.children) {
    text += child.type === 'text' ? child.value : textContent(child);
  }
  return text;
}
