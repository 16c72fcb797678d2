/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { parseBoolean, parseInteger, requiredAttribute } from './attributes';
import { diagnostic } from './diagnostics';
import type { Built, BuiltList, Diagnostic } from './diagnostics';
import { textContent } from './markup-tokenizer';
import type { MarkupElement, MarkupNode } from './types';
import { freezeNode } from '../nodes/tree';
import type { Container, MacroNode, Node, PanelType } from '../nodes/types';

/** Builds the nodes of a run of markup children (rich-text bodies). */
export type DispatchChildren = (nodes: readonly MarkupNode[]) => BuiltList<Node>;

const DEFAULT_PARAMETER = '';

function parameterLabel(name: string): string {
  return name === DEFAULT_PARAMETER ? '(default)' : name;
}

function findDescendant(element: MarkupElement, name: string): MarkupElement | undefined {
  for (const child of element.children) {
    if (child.type !== 'element') continue;
    if (child.name === name) return child;
    const nested = findDescendant(child, name);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Parameters and bodies of one macro element. Readers record malformed or
 * missing values in `issues` and fall back to a default.
 */
export class MacroReader {
  readonly name: string;
  readonly macroId?: string;
  readonly issues: Diagnostic[] = [];

  private readonly parameters = new Map<string, MarkupElement>();
  private readonly richBody?: MarkupElement;
  private readonly plainBody?: MarkupElement;
  private bodyIssues: readonly Diagnostic[] = [];

  constructor(
    readonly element: MarkupElement,
    name: string,
    private readonly dispatch: DispatchChildren
  ) {
    this.name = name;
    this.macroId = element.attributes['ac:macro-id'];
    for (const child of element.children) {
      if (child.type !== 'element') continue;
      if (child.name === 'ac:parameter') {
        const key = child.attributes['ac:name'] ?? DEFAULT_PARAMETER;
        if (!this.parameters.has(key)) this.parameters.set(key, child);
      } else if (child.name === 'ac:rich-text-body' && !this.richBody) {
        this.richBody = child;
      } else if (child.name === 'ac:plain-text-body' && !this.plainBody) {
        this.plainBody = child;
      }
    }
  }

  private invalid(parameter: string, raw: string): Diagnostic {
    return diagnostic('invalid_parameter', `${this.name}/${parameterLabel(parameter)}=${raw}`, this.element.startOffset);
  }

  has(parameter: string): boolean {
    return this.parameters.has(parameter);
  }

  /** Trimmed text of a parameter; undefined when absent or blank. */
  text(parameter: string): string | undefined {
    const element = this.parameters.get(parameter);
    if (!element) return undefined;
    const value = textContent(element).trim();
    return value === '' ? undefined : value;
  }

  flag(parameter: string, fallback = false): boolean {
    return parseBoolean(this.text(parameter), fallback, this.issues, (raw) => this.invalid(parameter, raw));
  }

  integer(parameter: string): number | undefined {
    return parseInteger(this.text(parameter), this.issues, (raw) => this.invalid(parameter, raw));
  }

  /** Attributes of a resource reference (`ri:page`, `ri:user`, ...) nested in a parameter. */
  reference(parameter: string, tag: string): Readonly<Record<string, string>> | undefined {
    const element = this.parameters.get(parameter);
    if (!element) return undefined;
    return findDescendant(element, tag)?.attributes;
  }

  /** Reports `missing_parameter` when `value` is absent; returns it unchanged. */
  require<T>(parameter: string, value: T | undefined): T | undefined {
    if (value === undefined) {
      this.issues.push(
        diagnostic('missing_parameter', `${this.name}/${parameterLabel(parameter)}`, this.element.startOffset)
      );
    }
    return value;
  }

  /** Nodes of the rich-text body, dispatched once. */
  body(): Node[] {
    if (!this.richBody) return [];
    const built = this.dispatch(this.richBody.children);
    this.bodyIssues = built.issues;
    return built.nodes;
  }

  /** Raw plain-text body, CDATA included, without any dispatch. */
  plainText(): string {
    return this.plainBody ? textContent(this.plainBody) : '';
  }

  /**
   * Content kept when the macro cannot be built: its rich body, else its
   * plain body, else whatever it holds besides parameters.
   */
  fallbackContent(): readonly MarkupNode[] {
    if (this.richBody) return this.richBody.children;
    if (this.plainBody) return this.plainBody.children;
    return this.element.children.filter((child) => child.type === 'text' || child.name !== 'ac:parameter');
  }

  finish<T extends Node>(node: T): Built<T> {
    return { node: freezeNode(node), issues: [...this.issues, ...this.bodyIssues] };
  }
}

export type MacroRule = (macro: MacroReader) => MacroNode;

function panel(panelType: PanelType): MacroRule {
  return (macro) => ({
    kind: 'panel-macro',
    macroId: macro.macroId,
    panelType,
    title: macro.text('title'),
    bgColor: macro.text('bgColor'),
    borderStyle: macro.text('borderStyle'),
    borderColor: macro.text('borderColor'),
    titleBgColor: macro.text('titleBGColor'),
    titleColor: macro.text('titleColor'),
    panelIcon: macro.text('panelIcon'),
    panelIconId: macro.text('panelIconId'),
    panelIconText: macro.text('panelIconText'),
    children: macro.body(),
  });
}

const code: MacroRule = (macro) => ({
  kind: 'code-macro',
  macroId: macro.macroId,
  language: macro.text('language'),
  title: macro.text('title'),
  collapse: macro.flag('collapse'),
  lineNumbers: macro.flag('linenumbers'),
  theme: macro.text('theme'),
  code: macro.plainText(),
});

const status: MacroRule = (macro) => ({
  kind: 'status-macro',
  macroId: macro.macroId,
  title: macro.text('title'),
  colour: macro.text('colour'),
  subtle: macro.flag('subtle'),
});

const expand: MacroRule = (macro) => ({
  kind: 'expand-macro',
  macroId: macro.macroId,
  title: macro.text('title'),
  children: macro.body(),
});

const details: MacroRule = (macro) => ({
  kind: 'details-macro',
  macroId: macro.macroId,
  title: macro.text('title'),
  id: macro.text('id'),
  hidden: macro.flag('hidden'),
  children: macro.body(),
});

const toc: MacroRule = (macro) => ({
  kind: 'toc-macro',
  macroId: macro.macroId,
  style: macro.text('style'),
  minLevel: macro.integer('minLevel'),
  maxLevel: macro.integer('maxLevel'),
  type: macro.text('type'),
  outline: macro.flag('outline'),
  include: macro.text('include'),
  exclude: macro.text('exclude'),
});

const jira: MacroRule = (macro) => {
  const jqlQuery = macro.text('jqlQuery');
  return {
    kind: 'jira-macro',
    macroId: macro.macroId,
    key: jqlQuery === undefined ? macro.require('key', macro.text('key')) : macro.text('key'),
    server: macro.text('server'),
    serverId: macro.text('serverId'),
    jqlQuery,
    maximumIssues: macro.integer('maximumIssues'),
  };
};

const include: MacroRule = (macro) => {
  const page = macro.reference(DEFAULT_PARAMETER, 'ri:page');
  return {
    kind: 'include-macro',
    macroId: macro.macroId,
    contentTitle: macro.require(DEFAULT_PARAMETER, page?.['ri:content-title'] ?? macro.text(DEFAULT_PARAMETER)),
    spaceKey: page?.['ri:space-key'],
  };
};

const excerptInclude: MacroRule = (macro) => {
  const parameter = macro.has(DEFAULT_PARAMETER) ? DEFAULT_PARAMETER : 'page';
  const target = macro.reference(parameter, 'ri:page') ?? macro.reference(parameter, 'ri:blog-post');
  return {
    kind: 'excerpt-include-macro',
    macroId: macro.macroId,
    contentTitle: macro.require(DEFAULT_PARAMETER, target?.['ri:content-title'] ?? macro.text(parameter)),
    spaceKey: target?.['ri:space-key'],
    postingDay: target?.['ri:posting-day'],
    noPanel: macro.flag('nopanel'),
  };
};

const tasksReport: MacroRule = (macro) => ({
  kind: 'tasks-report-macro',
  macroId: macro.macroId,
  spaces: macro.text('spaces') ?? macro.text('spaceAndPage'),
  labels: macro.text('labels'),
  status: macro.text('status'),
  pageSize: macro.integer('pageSize'),
  isMissingRequiredParameters: macro.flag('isMissingRequiredParameters'),
});

const attachments: MacroRule = (macro) => ({
  kind: 'attachments-macro',
  macroId: macro.macroId,
  patterns: macro.text('patterns'),
  sortBy: macro.text('sortBy'),
  upload: macro.flag('upload'),
  old: macro.flag('old'),
});

const viewPdf: MacroRule = (macro) => {
  const attachment = macro.reference('name', 'ri:attachment');
  return {
    kind: 'view-pdf-macro',
    macroId: macro.macroId,
    filename: macro.require('name', attachment?.['ri:filename'] ?? macro.text('name')),
    versionAtSave: attachment?.['ri:version-at-save'] ?? macro.text('version-at-save'),
    width: macro.text('width'),
    height: macro.text('height'),
  };
};

const viewFile: MacroRule = (macro) => {
  const attachment = macro.reference('name', 'ri:attachment');
  return {
    kind: 'view-file-macro',
    macroId: macro.macroId,
    filename: macro.require('name', attachment?.['ri:filename'] ?? macro.text('name')),
    versionAtSave: attachment?.['ri:version-at-save'] ?? macro.text('version-at-save'),
    height: macro.text('height'),
  };
};

const profile: MacroRule = (macro) => {
  const user = macro.reference('user', 'ri:user');
  return {
    kind: 'profile-macro',
    macroId: macro.macroId,
    accountId: macro.require('user', user?.['ri:account-id'] ?? user?.['ri:userkey']),
  };
};

const anchor: MacroRule = (macro) => ({
  kind: 'anchor-macro',
  macroId: macro.macroId,
  anchorName: macro.require(DEFAULT_PARAMETER, macro.text(DEFAULT_PARAMETER)),
});

const excerpt: MacroRule = (macro) => ({
  kind: 'excerpt-macro',
  macroId: macro.macroId,
  name: macro.text('name'),
  hidden: macro.flag('hidden'),
  children: macro.body(),
});

/** Supported macros by lower-cased `ac:name`. */
export const MACRO_RULES: ReadonlyMap<string, MacroRule> = new Map<string, MacroRule>([
  ['panel', panel('panel')],
  ['info', panel('info')],
  ['note', panel('note')],
  ['warning', panel('warning')],
  ['tip', panel('success')],
  ['success', panel('success')],
  ['error', panel('error')],
  ['code', code],
  ['status', status],
  ['expand', expand],
  ['details', details],
  ['page-properties', details],
  ['toc', toc],
  ['jira', jira],
  ['include', include],
  ['excerpt-include', excerptInclude],
  ['tasks-report-macro', tasksReport],
  ['attachments', attachments],
  ['viewpdf', viewPdf],
  ['view-file', viewFile],
  ['profile', profile],
  ['anchor', anchor],
  ['excerpt', excerpt],
]);

function degrade(macro: MacroReader, dispatch: DispatchChildren, issue: Diagnostic): Built<Node> {
  const content = dispatch(macro.fallbackContent());
  const node = freezeNode<Container>({ kind: 'container', tag: macro.element.name, children: content.nodes });
  return { node, issues: [issue, ...content.issues] };
}

/**
 * Build a structured macro. Macros without a name, and macros the registry
 * does not know, keep their body content in a container.
 */
export function buildMacro(element: MarkupElement, dispatch: DispatchChildren): Built<Node> {
  const missing: Diagnostic[] = [];
  const name = requiredAttribute(element, 'ac:name', missing);
  const macro = new MacroReader(element, name?.trim() ?? '', dispatch);
  if (name === undefined) return degrade(macro, dispatch, missing[0]);

  const rule = MACRO_RULES.get(macro.name.toLowerCase());
  if (!rule) return degrade(macro, dispatch, diagnostic('unknown_macro', name, element.startOffset));
  return macro.finish(rule(macro));
}
