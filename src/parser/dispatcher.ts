/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import {
  attr,
  enumAttribute,
  integerAttribute,
  invalidAttribute,
  numberAttribute,
  parseEnum,
  requiredAttribute,
} from './attributes';
import { diagnostic } from './diagnostics';
import type { Built, BuiltList, Diagnostic } from './diagnostics';
import { buildMacro } from './macro-registry';
import { textContent } from './markup-tokenizer';
import type { MarkupElement, MarkupNode, MarkupText } from './types';
import { freezeNode, isBlockLevel } from '../nodes/tree';
import { BREAKOUT_MODES, DECISION_STATES, LAYOUT_SECTION_TYPES, TASK_STATUSES } from '../nodes/types';
import type {
  Container,
  DecisionList,
  DecisionListItem,
  DecisionState,
  HeadingLevel,
  LayoutCell,
  LayoutSection,
  LinkElement,
  LinkType,
  ListElement,
  ListItem,
  ListType,
  Node,
  ResourceIdentifier,
  ResourceType,
  Table,
  TableCell,
  TableRow,
  Text,
  TextBreak,
  TextEffect,
} from '../nodes/types';

type ElementRule = (element: MarkupElement) => BuiltList<Node>;

/** Accepts a child of a structured parent; undefined when the child does not fit. */
type SlotRule<C extends Node> = (element: MarkupElement) => BuiltList<C> | undefined;

const HEADING_LEVELS: Readonly<Record<string, HeadingLevel>> = { h1: 1, h2: 2, h3: 3, h4: 4, h5: 5, h6: 6 };

const TEXT_EFFECT_TAGS: Readonly<Record<string, TextEffect>> = {
  strong: 'strong',
  b: 'strong',
  em: 'emphasis',
  i: 'emphasis',
  u: 'underline',
  s: 'strikethrough',
  del: 'strikethrough',
  strike: 'strikethrough',
  code: 'monospace',
  pre: 'monospace',
  sub: 'subscript',
  sup: 'superscript',
  blockquote: 'blockquote',
  span: 'span',
};

const RESOURCE_TAGS: Readonly<Record<string, ResourceType>> = {
  'ri:page': 'page',
  'ri:blog-post': 'blog-post',
  'ri:attachment': 'attachment',
  'ri:url': 'url',
  'ri:shortcut': 'shortcut',
  'ri:user': 'user',
  'ri:space': 'space',
  'ri:content-entity': 'content-entity',
};

/** Attributes identifying the target of a reference; any one of them will do. */
const RESOURCE_KEYS: Readonly<Record<ResourceType, readonly string[]>> = {
  page: ['ri:content-title', 'ri:content-id'],
  'blog-post': ['ri:content-title'],
  attachment: ['ri:filename'],
  url: ['ri:value'],
  shortcut: ['ri:key'],
  user: ['ri:account-id', 'ri:userkey'],
  space: ['ri:space-key'],
  'content-entity': ['ri:content-id'],
};

const RESOURCE_LINK_TYPES: Readonly<Record<ResourceType, LinkType>> = {
  page: 'page',
  'blog-post': 'blog-post',
  attachment: 'attachment',
  url: 'external',
  shortcut: 'external',
  user: 'user',
  space: 'space',
  'content-entity': 'page',
};

/** Markup that only wraps content. */
const NEUTRAL_TAGS = [
  'div',
  'tbody',
  'thead',
  'tfoot',
  'ac:inline-comment-marker',
  'ac:rich-text-body',
  'ac:plain-text-body',
  'ac:link-body',
  'ac:plain-text-link-body',
  'ac:task-body',
  'ac:caption',
  'ac:content',
  'ac:adf-content',
  'ac:adf-fallback',
];

/** Markup read by its parent and never turned into nodes of its own. */
const SKIPPED_TAGS = [
  'colgroup',
  'col',
  'ac:parameter',
  'ac:adf-attribute',
  'ac:task-id',
  'ac:task-uuid',
  'ac:task-status',
];

function single<T extends Node>(built: Built<T>): BuiltList<T> {
  return { nodes: [built.node], issues: built.issues };
}

function nothing(): BuiltList<Node> {
  return { nodes: [], issues: [] };
}

/**
 * Finalize a node built on top of already dispatched children. Issues the
 * node records about itself precede those of its children.
 */
function assemble<C extends Node, T extends Node>(
  children: BuiltList<C>,
  make: (nodes: C[], issues: Diagnostic[]) => T
): Built<T> {
  const issues: Diagnostic[] = [];
  const node = freezeNode(make(children.nodes, issues));
  return { node, issues: [...issues, ...children.issues] };
}

function textNode(value: string): Text {
  return freezeNode<Text>({ kind: 'text', text: value });
}

/** Whitespace between tags that only serves to indent the source. */
function isIndentation(text: MarkupText): boolean {
  return !text.cdata && text.value.trim() === '' && text.value.includes('\n');
}

function childElements(element: MarkupElement, name: string): MarkupElement[] {
  const found: MarkupElement[] = [];
  for (const child of element.children) {
    if (child.type === 'element' && child.name === name) found.push(child);
  }
  return found;
}

function firstChild(element: MarkupElement, name: string): MarkupElement | undefined {
  return childElements(element, name)[0];
}

function trimmedText(element: MarkupElement): string | undefined {
  const text = textContent(element).trim();
  return text === '' ? undefined : text;
}

/**
 * Dispatch a run of markup nodes in document order.
 */
export function dispatchChildren(nodes: readonly MarkupNode[]): BuiltList<Node> {
  const out: Node[] = [];
  const issues: Diagnostic[] = [];
  // Indentation between two inline siblings still separates their words.
  let indented = false;
  const emit = (built: readonly Node[]): void => {
    for (const node of built) {
      const previous = out[out.length - 1];
      if (indented && previous && !isBlockLevel(previous) && !isBlockLevel(node)) out.push(textNode(' '));
      indented = false;
      out.push(node);
    }
  };
  for (const child of nodes) {
    if (child.type === 'text') {
      if (isIndentation(child)) indented = true;
      else emit([textNode(child.value)]);
      continue;
    }
    const built = dispatchElement(child);
    emit(built.nodes);
    issues.push(...built.issues);
  }
  return { nodes: out, issues };
}

/**
 * Build the nodes of one element. Most elements yield exactly one node;
 * markup read by its parent yields none.
 */
export function dispatchElement(element: MarkupElement): BuiltList<Node> {
  const rule = RULES.get(element.name);
  return rule ? rule(element) : unknownElement(element);
}

/**
 * Dispatch the top-level forest and consolidate it into a single root:
 * nothing for an empty forest, the node itself for one item, a fragment
 * otherwise. Blank top-level text is not content.
 */
export function dispatchRoot(nodes: readonly MarkupNode[]): Built<Node | undefined> {
  const content = nodes.filter((node) => node.type === 'element' || node.value.trim() !== '');
  const built = dispatchChildren(content);
  if (built.nodes.length === 0) return { node: undefined, issues: built.issues };
  if (built.nodes.length === 1) return { node: built.nodes[0], issues: built.issues };
  return assemble(built, (children): Node => ({ kind: 'fragment', children }));
}

function container(element: MarkupElement, children: readonly MarkupNode[] = element.children): Built<Container> {
  return assemble(dispatchChildren(children), (nodes): Container => ({
    kind: 'container',
    tag: element.name,
    children: nodes,
  }));
}

function neutral(element: MarkupElement): BuiltList<Node> {
  return single(container(element));
}

function unknownElement(element: MarkupElement): BuiltList<Node> {
  const built = container(element);
  return {
    nodes: [built.node],
    issues: [diagnostic('unknown_element', element.rawName, element.startOffset), ...built.issues],
  };
}

/**
 * Children of a parent that only holds one node variant. Fitting children
 * are built by `accept`; anything else is wrapped into a synthesized child
 * and reported as `unexpected_child:<parent>/<tag>`.
 */
function structuredChildren<C extends Node>(
  parent: MarkupElement,
  accept: SlotRule<C>,
  wrap: (nodes: Node[]) => C
): BuiltList<C> {
  const nodes: C[] = [];
  const issues: Diagnostic[] = [];
  for (const child of parent.children) {
    if (child.type === 'text') {
      if (child.value.trim() === '') continue;
      issues.push(diagnostic('unexpected_child', `${parent.rawName}/#text`, parent.startOffset));
      nodes.push(wrap([textNode(child.value)]));
      continue;
    }
    const accepted = accept(child);
    if (accepted) {
      nodes.push(...accepted.nodes);
      issues.push(...accepted.issues);
      continue;
    }
    const stray = dispatchElement(child);
    if (stray.nodes.length === 0) {
      issues.push(...stray.issues);
      continue;
    }
    issues.push(diagnostic('unexpected_child', `${parent.rawName}/${child.rawName}`, child.startOffset), ...stray.issues);
    nodes.push(wrap(stray.nodes));
  }
  return { nodes, issues };
}

// Text and formatting

function heading(element: MarkupElement): BuiltList<Node> {
  const level = HEADING_LEVELS[element.name];
  return single(assemble(dispatchChildren(element.children), (children): Node => ({ kind: 'heading', level, children })));
}

function textBreak(breakType: TextBreak): ElementRule {
  return (element) =>
    single(assemble(dispatchChildren(element.children), (children): Node => ({ kind: 'text-break', breakType, children })));
}

function textEffect(element: MarkupElement): BuiltList<Node> {
  const effect = TEXT_EFFECT_TAGS[element.name];
  return single(
    assemble(dispatchChildren(element.children), (children): Node => ({
      kind: 'text-effect',
      effect,
      style: effect === 'span' ? attr(element, 'style') : undefined,
      children,
    }))
  );
}

function time(element: MarkupElement): BuiltList<Node> {
  return single(assemble(nothing(), (): Node => ({ kind: 'time', datetime: attr(element, 'datetime', 'ac:datetime') })));
}

function placeholder(element: MarkupElement): BuiltList<Node> {
  return single(
    assemble(nothing(), (): Node => ({
      kind: 'placeholder',
      placeholderType: attr(element, 'ac:type'),
      text: textContent(element).trim(),
    }))
  );
}

function emoticon(element: MarkupElement): BuiltList<Node> {
  return single(
    assemble(nothing(), (): Node => ({
      kind: 'emoticon',
      name: attr(element, 'ac:name'),
      emojiShortname: attr(element, 'ac:emoji-shortname'),
      emojiId: attr(element, 'ac:emoji-id'),
      emojiFallback: attr(element, 'ac:emoji-fallback'),
    }))
  );
}

function image(element: MarkupElement): BuiltList<Node> {
  return single(
    assemble(dispatchChildren(element.children), (nodes): Node => {
      let src = attr(element, 'src', 'ac:src');
      let filename: string | undefined;
      const caption: Node[] = [];
      for (const node of nodes) {
        if (node.kind !== 'resource-identifier') caption.push(node);
        else if (node.resourceType === 'attachment' && filename === undefined) filename = node.filename;
        else if (node.resourceType === 'url' && src === undefined) src = node.value;
      }
      return {
        kind: 'image',
        src,
        filename,
        alt: attr(element, 'ac:alt', 'alt'),
        title: attr(element, 'ac:title', 'title'),
        width: attr(element, 'ac:width', 'width'),
        height: attr(element, 'ac:height', 'height'),
        children: caption,
      };
    })
  );
}

// Lists and tasks

function wrapListItem(nodes: Node[]): ListItem {
  return freezeNode<ListItem>({ kind: 'list-item', children: nodes });
}

function listItem(element: MarkupElement): BuiltList<ListItem> {
  return single(assemble(dispatchChildren(element.children), (children): ListItem => ({ kind: 'list-item', children })));
}

function taskItem(element: MarkupElement): BuiltList<ListItem> {
  let taskId = attr(element, 'ac:task-id');
  let uuid = attr(element, 'ac:task-uuid');
  let rawStatus = attr(element, 'ac:task-status', 'status');
  const body: MarkupNode[] = [];
  for (const child of element.children) {
    if (child.type === 'element' && child.name === 'ac:task-id') taskId = trimmedText(child);
    else if (child.type === 'element' && child.name === 'ac:task-uuid') uuid = trimmedText(child);
    else if (child.type === 'element' && child.name === 'ac:task-status') rawStatus = trimmedText(child);
    else body.push(child);
  }
  return single(
    assemble(dispatchChildren(body), (children, issues): ListItem => ({
      kind: 'list-item',
      taskId,
      uuid,
      status: parseEnum(rawStatus, TASK_STATUSES, issues, invalidAttribute(element, 'ac:task-status')),
      children,
    }))
  );
}

function list(listType: ListType, accept: SlotRule<ListItem>): ElementRule {
  return (element) =>
    single(
      assemble(structuredChildren(element, accept, wrapListItem), (children, issues): ListElement => ({
        kind: 'list',
        listType,
        start: listType === 'ordered' ? integerAttribute(element, 'start', issues) : undefined,
        children,
      }))
    );
}

const acceptListItem: SlotRule<ListItem> = (element) => (element.name === 'li' ? listItem(element) : undefined);
const acceptTask: SlotRule<ListItem> = (element) => (element.name === 'ac:task' ? taskItem(element) : undefined);

// Tables

function wrapCell(nodes: Node[]): TableCell {
  return freezeNode<TableCell>({ kind: 'table-cell', isHeader: false, rowspan: 1, colspan: 1, children: nodes });
}

function wrapRow(nodes: Node[]): TableRow {
  return freezeNode<TableRow>({ kind: 'table-row', children: [wrapCell(nodes)] });
}

function cellSpan(element: MarkupElement, name: string, issues: Diagnostic[]): number {
  const value = integerAttribute(element, name, issues);
  if (value === undefined) return 1;
  if (value < 1) {
    issues.push(invalidAttribute(element, name)(element.attributes[name] ?? String(value)));
    return 1;
  }
  return value;
}

function tableCell(element: MarkupElement): BuiltList<TableCell> {
  return single(
    assemble(dispatchChildren(element.children), (children, issues): TableCell => ({
      kind: 'table-cell',
      isHeader: element.name === 'th',
      rowspan: cellSpan(element, 'rowspan', issues),
      colspan: cellSpan(element, 'colspan', issues),
      children,
    }))
  );
}

const acceptCell: SlotRule<TableCell> = (element) =>
  element.name === 'td' || element.name === 'th' ? tableCell(element) : undefined;

function tableRow(element: MarkupElement): BuiltList<TableRow> {
  return single(
    assemble(structuredChildren(element, acceptCell, wrapCell), (children): TableRow => ({ kind: 'table-row', children }))
  );
}

const acceptRow: SlotRule<TableRow> = (element) => {
  switch (element.name) {
    case 'tr':
      return tableRow(element);
    case 'tbody':
    case 'thead':
    case 'tfoot':
      return structuredChildren(element, acceptRow, wrapRow);
    default:
      return undefined;
  }
};

function table(element: MarkupElement): BuiltList<Node> {
  return single(
    assemble(structuredChildren(element, acceptRow, wrapRow), (children, issues): Table => ({
      kind: 'table',
      width: numberAttribute(element, 'data-table-width', issues),
      layout: attr(element, 'data-layout'),
      localId: attr(element, 'ac:local-id'),
      displayMode: attr(element, 'data-table-display-mode'),
      children,
    }))
  );
}

// Layouts

function wrapLayoutCell(nodes: Node[]): LayoutCell {
  return freezeNode<LayoutCell>({ kind: 'layout-cell', children: nodes });
}

function wrapSection(nodes: Node[]): LayoutSection {
  return freezeNode<LayoutSection>({ kind: 'layout-section', children: [wrapLayoutCell(nodes)] });
}

function layoutCell(element: MarkupElement): BuiltList<LayoutCell> {
  return single(assemble(dispatchChildren(element.children), (children): LayoutCell => ({ kind: 'layout-cell', children })));
}

const acceptLayoutCell: SlotRule<LayoutCell> = (element) =>
  element.name === 'ac:layout-cell' ? layoutCell(element) : undefined;

function layoutSection(element: MarkupElement): BuiltList<LayoutSection> {
  return single(
    assemble(structuredChildren(element, acceptLayoutCell, wrapLayoutCell), (children, issues): LayoutSection => ({
      kind: 'layout-section',
      sectionType: enumAttribute(element, 'ac:type', LAYOUT_SECTION_TYPES, issues),
      breakoutMode: enumAttribute(element, 'ac:breakout-mode', BREAKOUT_MODES, issues),
      breakoutWidth: numberAttribute(element, 'ac:breakout-width', issues),
      children,
    }))
  );
}

const acceptSection: SlotRule<LayoutSection> = (element) =>
  element.name === 'ac:layout-section' ? layoutSection(element) : undefined;

function layout(element: MarkupElement): BuiltList<Node> {
  return single(
    assemble(structuredChildren(element, acceptSection, wrapSection), (children): Node => ({ kind: 'layout', children }))
  );
}

// Links and resource references

function resourceIdentifier(element: MarkupElement): BuiltList<Node> {
  const resourceType = RESOURCE_TAGS[element.name];
  return single(
    assemble(nothing(), (_, issues): ResourceIdentifier => {
      const keys = RESOURCE_KEYS[resourceType];
      if (!keys.some((key) => (element.attributes[key] ?? '').trim() !== '')) {
        requiredAttribute(element, keys[0], issues);
      }
      return {
        kind: 'resource-identifier',
        resourceType,
        contentTitle: attr(element, 'ri:content-title'),
        spaceKey: attr(element, 'ri:space-key'),
        versionAtSave: attr(element, 'ri:version-at-save'),
        postingDay: attr(element, 'ri:posting-day'),
        filename: attr(element, 'ri:filename'),
        contentId: attr(element, 'ri:content-id'),
        value: attr(element, 'ri:value'),
        key: attr(element, 'ri:key'),
        parameter: attr(element, 'ri:parameter'),
        accountId: attr(element, 'ri:account-id'),
        userkey: attr(element, 'ri:userkey'),
        localId: attr(element, 'ri:local-id'),
      };
    })
  );
}

function htmlLink(element: MarkupElement): BuiltList<Node> {
  const href = attr(element, 'href');
  let linkType: LinkType = 'external';
  let anchor: string | undefined;
  if (href?.startsWith('mailto:')) {
    linkType = 'mailto';
  } else if (href?.startsWith('#')) {
    linkType = 'anchor';
    anchor = href.slice(1);
  }
  return single(
    assemble(dispatchChildren(element.children), (children): LinkElement => ({
      kind: 'link',
      linkType,
      href,
      anchor,
      cardAppearance: attr(element, 'data-card-appearance'),
      children,
    }))
  );
}

function storageLink(element: MarkupElement): BuiltList<Node> {
  const anchor = attr(element, 'ac:anchor');
  return single(
    assemble(dispatchChildren(element.children), (children): LinkElement => {
      let resource: ResourceIdentifier | undefined;
      for (const child of children) {
        if (child.kind === 'resource-identifier') {
          resource = child;
          break;
        }
      }
      let linkType: LinkType = anchor !== undefined ? 'anchor' : 'page';
      if (resource) linkType = RESOURCE_LINK_TYPES[resource.resourceType];
      return {
        kind: 'link',
        linkType,
        href: resource?.resourceType === 'url' ? resource.value : undefined,
        anchor,
        cardAppearance: attr(element, 'ac:card-appearance'),
        children,
      };
    })
  );
}

// ADF decision lists

function adfAttribute(element: MarkupElement, key: string): string | undefined {
  for (const child of childElements(element, 'ac:adf-attribute')) {
    if (child.attributes.key === key) return trimmedText(child);
  }
  return undefined;
}

function adfType(element: MarkupElement): string | undefined {
  return element.attributes.type?.trim().toLowerCase();
}

function decisionState(element: MarkupElement, issues: Diagnostic[]): DecisionState | undefined {
  return parseEnum(adfAttribute(element, 'state'), DECISION_STATES, issues, invalidAttribute(element, 'state'));
}

function wrapDecisionItem(nodes: Node[]): DecisionListItem {
  return freezeNode<DecisionListItem>({ kind: 'decision-list-item', children: nodes });
}

function decisionItem(element: MarkupElement): BuiltList<DecisionListItem> {
  return single(
    assemble(dispatchChildren(element.children), (children, issues): DecisionListItem => ({
      kind: 'decision-list-item',
      localId: attr(element, 'local-id', 'ac:local-id'),
      state: decisionState(element, issues),
      children,
    }))
  );
}

const acceptDecisionItem: SlotRule<DecisionListItem> = (element) =>
  element.name === 'ac:adf-node' && adfType(element) === 'decision-item' ? decisionItem(element) : undefined;

/** Items rendered by the fallback markup, when the ADF node carries none. */
function fallbackDecisionItems(fallback: MarkupElement, state: DecisionState | undefined): BuiltList<DecisionListItem> {
  const acceptFallbackItem: SlotRule<DecisionListItem> = (element) =>
    element.name === 'li'
      ? single(
          assemble(dispatchChildren(element.children), (children): DecisionListItem => ({
            kind: 'decision-list-item',
            state,
            children,
          }))
        )
      : undefined;
  const nodes: DecisionListItem[] = [];
  const issues: Diagnostic[] = [];
  for (const child of fallback.children) {
    if (child.type !== 'element' || (child.name !== 'ul' && child.name !== 'ol')) continue;
    const items = structuredChildren(child, acceptFallbackItem, wrapDecisionItem);
    nodes.push(...items.nodes);
    issues.push(...items.issues);
  }
  return { nodes, issues };
}

function decisionList(element: MarkupElement, fallback: MarkupElement | undefined): BuiltList<Node> {
  const stateIssues: Diagnostic[] = [];
  const state = decisionState(element, stateIssues);
  const hasItems = childElements(element, 'ac:adf-node').length > 0;
  const items =
    !hasItems && fallback
      ? fallbackDecisionItems(fallback, state)
      : structuredChildren(element, acceptDecisionItem, wrapDecisionItem);
  return single(
    assemble(items, (children, issues): DecisionList => {
      issues.push(...stateIssues);
      return { kind: 'decision-list', localId: attr(element, 'local-id', 'ac:local-id'), children };
    })
  );
}

function adfNode(element: MarkupElement, fallback?: MarkupElement): BuiltList<Node> {
  const issues: Diagnostic[] = [];
  const type = requiredAttribute(element, 'type', issues);
  switch (type?.trim().toLowerCase()) {
    case 'decision-list':
      return decisionList(element, fallback);
    case 'decision-item':
      return decisionItem(element);
    case undefined:
      break;
    default:
      issues.push(diagnostic('unknown_adf_node', type ?? '', element.startOffset));
  }
  const degraded = container(element, fallback ? fallback.children : element.children);
  return { nodes: [degraded.node], issues: [...issues, ...degraded.issues] };
}

function adfExtension(element: MarkupElement): BuiltList<Node> {
  const node = firstChild(element, 'ac:adf-node');
  return node ? adfNode(node, firstChild(element, 'ac:adf-fallback')) : neutral(element);
}

function macro(element: MarkupElement): BuiltList<Node> {
  return single(buildMacro(element, dispatchChildren));
}

const RULES: ReadonlyMap<string, ElementRule> = new Map<string, ElementRule>([
  ...Object.keys(HEADING_LEVELS).map((tag): [string, ElementRule] => [tag, heading]),
  ...Object.keys(TEXT_EFFECT_TAGS).map((tag): [string, ElementRule] => [tag, textEffect]),
  ...Object.keys(RESOURCE_TAGS).map((tag): [string, ElementRule] => [tag, resourceIdentifier]),
  ...NEUTRAL_TAGS.map((tag): [string, ElementRule] => [tag, neutral]),
  ...SKIPPED_TAGS.map((tag): [string, ElementRule] => [tag, nothing]),
  ['p', textBreak('paragraph')],
  ['br', textBreak('line-break')],
  ['hr', textBreak('horizontal-rule')],
  ['a', htmlLink],
  ['img', image],
  ['time', time],
  ['table', table],
  ['tr', tableRow],
  ['td', tableCell],
  ['th', tableCell],
  ['ul', list('unordered', acceptListItem)],
  ['ol', list('ordered', acceptListItem)],
  ['li', listItem],
  ['ac:layout', layout],
  ['ac:layout-section', layoutSection],
  ['ac:layout-cell', layoutCell],
  ['ac:task-list', list('task', acceptTask)],
  ['ac:task', taskItem],
  ['ac:structured-macro', macro],
  ['ac:macro', macro],
  ['ac:placeholder', placeholder],
  ['ac:link', storageLink],
  ['ac:image', image],
  ['ac:emoticon', emoticon],
  ['ac:time', time],
  ['ac:adf-extension', adfExtension],
  ['ac:adf-node', (element) => adfNode(element)],
]);
