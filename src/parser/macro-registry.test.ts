/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { dispatchChildren } from './dispatcher';
import { formatDiagnostic } from './diagnostics';
import { MACRO_RULES, buildMacro } from './macro-registry';
import { tokenizeMarkup } from './markup-tokenizer';
import { toText } from '../nodes/text';
import type { Node } from '../nodes/types';

function macro(markup: string): { node: Node; messages: string[] } {
  const [element] = tokenizeMarkup(markup).nodes;
  if (!element || element.type !== 'element') throw new Error('expected an element');
  const built = buildMacro(element, dispatchChildren);
  return { node: built.node, messages: built.issues.map(formatDiagnostic) };
}

describe('buildMacro', () => {
  it('renders an info panel on one line', () => {
    const { node, messages } = macro(
      '<ac:structured-macro ac:name="info" ac:macro-id="info-1"><ac:rich-text-body>' +
        '<p>This is an info panel with <strong>important</strong> information.</p>' +
        '</ac:rich-text-body></ac:structured-macro>'
    );
    expect(messages).toEqual([]);
    expect(node).toMatchObject({ kind: 'panel-macro', panelType: 'info', macroId: 'info-1' });
    expect(toText(node)).toBe('ℹ️ INFO: This is an info panel with important information.');
  });

  it('reads panel styling parameters', () => {
    const { node } = macro(
      '<ac:structured-macro ac:name="panel" ac:macro-id="panel-1">' +
        '<ac:parameter ac:name="title">Important Note</ac:parameter>' +
        '<ac:parameter ac:name="bgColor">#F4F9FF</ac:parameter>' +
        '<ac:parameter ac:name="titleBGColor">#E6FCFF</ac:parameter>' +
        '<ac:parameter ac:name="panelIcon">:rainbow:</ac:parameter>' +
        '<ac:parameter ac:name="panelIconText">🌈</ac:parameter>' +
        '<ac:rich-text-body><p>Panel content</p></ac:rich-text-body></ac:structured-macro>'
    );
    expect(node).toMatchObject({
      kind: 'panel-macro',
      panelType: 'panel',
      title: 'Important Note',
      bgColor: '#F4F9FF',
      titleBgColor: '#E6FCFF',
      panelIcon: ':rainbow:',
      panelIconText: '🌈',
    });
    expect(toText(node)).toBe('🌈 Panel content');
  });

  it('maps tip to a success panel and matches names case-insensitively', () => {
    expect(macro('<ac:structured-macro ac:name="tip"/>').node).toMatchObject({ panelType: 'success' });
    expect(macro('<ac:structured-macro ac:name="INFO"/>').node).toMatchObject({ panelType: 'info' });
  });

  it('keeps the plain-text body of code macros verbatim', () => {
    const { node, messages } = macro(
      '<ac:structured-macro ac:name="code"><ac:parameter ac:name="language">typescript</ac:parameter>' +
        '<ac:parameter ac:name="linenumbers">true</ac:parameter>' +
        '<ac:plain-text-body><![CDATA[print("hi")\n  x = 1]]></ac:plain-text-body></ac:structured-macro>'
    );
    expect(messages).toEqual([]);
    expect(node).toMatchObject({ kind: 'code-macro', language: 'typescript', lineNumbers: true, collapse: false });
    expect(toText(node)).toBe('print("hi")\n  x = 1');
  });

  it('reads status parameters and reports a malformed flag', () => {
    const { node, messages } = macro(
      '<ac:structured-macro ac:name="status"><ac:parameter ac:name="title">In Progress</ac:parameter>' +
        '<ac:parameter ac:name="colour">Blue</ac:parameter><ac:parameter ac:name="subtle">maybe</ac:parameter>' +
        '</ac:structured-macro>'
    );
    expect(messages).toEqual(['invalid_parameter:status/subtle=maybe']);
    expect(node).toMatchObject({ kind: 'status-macro', title: 'In Progress', colour: 'Blue', subtle: false });
    expect(toText(node)).toBe('🏷️ Status: In Progress (Blue)');
  });

  it('renders expand and details bodies without their title', () => {
    const expand = macro(
      '<ac:structured-macro ac:name="expand"><ac:parameter ac:name="title">More</ac:parameter>' +
        '<ac:rich-text-body><p>Hidden content</p></ac:rich-text-body></ac:structured-macro>'
    ).node;
    expect(expand).toMatchObject({ kind: 'expand-macro', title: 'More' });
    expect(toText(expand)).toBe('Hidden content');
    const details = macro(
      '<ac:structured-macro ac:name="details"><ac:parameter ac:name="hidden">true</ac:parameter>' +
        '<ac:rich-text-body><p>Owner</p></ac:rich-text-body></ac:structured-macro>'
    ).node;
    expect(details).toMatchObject({ kind: 'details-macro', hidden: true });
    expect(toText(details)).toBe('Owner');
  });

  it('reports malformed toc levels', () => {
    const { node, messages } = macro(
      '<ac:structured-macro ac:name="toc"><ac:parameter ac:name="minLevel">1</ac:parameter>' +
        '<ac:parameter ac:name="maxLevel">x</ac:parameter></ac:structured-macro>'
    );
    expect(messages).toEqual(['invalid_parameter:toc/maxLevel=x']);
    expect(node).toMatchObject({ kind: 'toc-macro', minLevel: 1, maxLevel: undefined });
  });

  it('requires a jira key unless a query is given', () => {
    const missing = macro(
      '<ac:structured-macro ac:name="jira"><ac:parameter ac:name="server">Production Jira</ac:parameter>' +
        '</ac:structured-macro>'
    );
    expect(missing.messages).toEqual(['missing_parameter:jira/key']);
    const query = macro(
      '<ac:structured-macro ac:name="jira"><ac:parameter ac:name="jqlQuery">project = X</ac:parameter>' +
        '</ac:structured-macro>'
    );
    expect(query.messages).toEqual([]);
    expect(toText(query.node)).toBe('🎫 JIRA Query: project = X');
  });

  it('reads page references from the default parameter', () => {
    const { node, messages } = macro(
      '<ac:structured-macro ac:name="include"><ac:parameter ac:name=""><ac:link>' +
        '<ri:page ri:content-title="Setup" ri:space-key="DOC"/></ac:link></ac:parameter></ac:structured-macro>'
    );
    expect(messages).toEqual([]);
    expect(node).toMatchObject({ kind: 'include-macro', contentTitle: 'Setup', spaceKey: 'DOC' });
    expect(macro('<ac:structured-macro ac:name="include"/>').messages).toEqual(['missing_parameter:include/(default)']);
  });

  it('reads excerpt includes given by page name', () => {
    const { node } = macro(
      '<ac:structured-macro ac:name="excerpt-include"><ac:parameter ac:name="page">Home</ac:parameter>' +
        '<ac:parameter ac:name="nopanel">true</ac:parameter></ac:structured-macro>'
    );
    expect(node).toMatchObject({ kind: 'excerpt-include-macro', contentTitle: 'Home', noPanel: true });
    expect(toText(node)).toBe('📝 Excerpt: Home');
  });

  it('reads attachment references of file viewers', () => {
    const { node } = macro(
      '<ac:structured-macro ac:name="view-file"><ac:parameter ac:name="name">' +
        '<ri:attachment ri:filename="Guide.pdf" ri:version-at-save="1"/></ac:parameter></ac:structured-macro>'
    );
    expect(node).toMatchObject({ kind: 'view-file-macro', filename: 'Guide.pdf', versionAtSave: '1' });
    expect(toText(node)).toBe('📁 File: Guide.pdf');
    expect(macro('<ac:structured-macro ac:name="viewpdf"/>').messages).toEqual(['missing_parameter:viewpdf/name']);
  });

  it('reads profile, anchor and report parameters', () => {
    expect(
      macro(
        '<ac:structured-macro ac:name="profile"><ac:parameter ac:name="user"><ri:user ri:account-id="acc-1"/>' +
          '</ac:parameter></ac:structured-macro>'
      ).node
    ).toMatchObject({ kind: 'profile-macro', accountId: 'acc-1' });
    expect(
      toText(macro('<ac:structured-macro ac:name="anchor"><ac:parameter ac:name="">top</ac:parameter></ac:structured-macro>').node)
    ).toBe('⚓ Anchor: top');
    expect(
      macro(
        '<ac:structured-macro ac:name="tasks-report-macro"><ac:parameter ac:name="spaces">DOC</ac:parameter>' +
          '<ac:parameter ac:name="pageSize">20</ac:parameter></ac:structured-macro>'
      ).node
    ).toMatchObject({ kind: 'tasks-report-macro', spaces: 'DOC', pageSize: 20, isMissingRequiredParameters: false });
    expect(
      macro(
        '<ac:structured-macro ac:name="attachments"><ac:parameter ac:name="patterns">*.png,*.jpg</ac:parameter>' +
          '</ac:structured-macro>'
      ).node
    ).toMatchObject({ kind: 'attachments-macro', patterns: '*.png,*.jpg', upload: false, old: false });
  });

  it('reports parameter issues before body issues', () => {
    const { node, messages } = macro(
      '<ac:structured-macro ac:name="excerpt"><ac:parameter ac:name="hidden">nope</ac:parameter>' +
        '<ac:rich-text-body><p>Short <blink>summary</blink></p></ac:rich-text-body></ac:structured-macro>'
    );
    expect(messages).toEqual(['invalid_parameter:excerpt/hidden=nope', 'unknown_element:blink']);
    expect(toText(node)).toBe('📄 Excerpt: Short summary');
  });

  it('keeps the body of unknown macros', () => {
    const { node, messages } = macro(
      '<ac:structured-macro ac:name="Gallery"><ac:parameter ac:name="a">b</ac:parameter>' +
        '<ac:rich-text-body><p>Kept</p></ac:rich-text-body></ac:structured-macro>'
    );
    expect(messages).toEqual(['unknown_macro:Gallery']);
    expect(node).toMatchObject({ kind: 'container', tag: 'ac:structured-macro' });
    expect(toText(node)).toBe('Kept');
  });

  it('reports a macro without a name', () => {
    const { node, messages } = macro('<ac:macro><ac:plain-text-body>raw</ac:plain-text-body></ac:macro>');
    expect(messages).toEqual(['missing_attribute:ac:macro@ac:name']);
    expect(toText(node)).toBe('raw');
  });

  it('knows every supported macro name', () => {
    expect([...MACRO_RULES.keys()]).toEqual(
      expect.arrayContaining([
        'panel',
        'info',
        'note',
        'warning',
        'tip',
        'success',
        'error',
        'code',
        'status',
        'expand',
        'details',
        'toc',
        'jira',
        'include',
        'excerpt-include',
        'tasks-report-macro',
        'attachments',
        'viewpdf',
        'view-file',
        'profile',
        'anchor',
        'excerpt',
      ])
    );
  });
});
