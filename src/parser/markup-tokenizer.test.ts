/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { textContent, tokenizeMarkup } from './markup-tokenizer';
import type { MarkupElement, MarkupNode } from './types';

function element(node: MarkupNode | undefined): MarkupElement {
  if (!node || node.type !== 'element') throw new Error('expected an element');
  return node;
}

describe('tokenizeMarkup', () => {
  it('returns every top-level sibling in order', () => {
    const result = tokenizeMarkup('<h1>Title</h1><p>Body</p>');
    expect(result.errors).toHaveLength(0);
    expect(result.nodes.map((n) => element(n).name)).toEqual(['h1', 'p']);
    expect(element(result.nodes[0]).children).toEqual([{ type: 'text', value: 'Title', cdata: false }]);
  });

  it('returns an empty forest for empty input', () => {
    const result = tokenizeMarkup('');
    expect(result.nodes).toEqual([]);
    expect(result.errors).toEqual([]);
  });

  it('keeps qualified names and attribute values as written', () => {
    const result = tokenizeMarkup('<ac:structured-macro ac:name="Code" ac:macro-id="m-1"/>');
    const macro = element(result.nodes[0]);
    expect(macro.name).toBe('ac:structured-macro');
    expect(macro.rawName).toBe('ac:structured-macro');
    expect(macro.attributes).toEqual({ 'ac:name': 'Code', 'ac:macro-id': 'm-1' });
  });

  it('lower-cases tag names and keeps the source spelling beside them', () => {
    const result = tokenizeMarkup('<H1>Loud</H1><MyTag a="1">x</MyTag><AC:Task-List/>');
    expect(result.nodes.map((n) => element(n).name)).toEqual(['h1', 'mytag', 'ac:task-list']);
    expect(result.nodes.map((n) => element(n).rawName)).toEqual(['H1', 'MyTag', 'AC:Task-List']);
  });

  it('keeps the content of script elements as text', () => {
    const result = tokenizeMarkup('<script>a &lt; b</script>');
    expect(result.errors).toEqual([]);
    expect(element(result.nodes[0]).children).toEqual([{ type: 'text', value: 'a &lt; b', cdata: false }]);
  });

  it('rejects a closing tag of the reserved wrapper name', () => {
    const result = tokenizeMarkup('<p>a</p></storage-root><p>b</p>');
    expect(result.errors).toEqual([{ line: 0, column: 23, message: 'Reserved element name: storage-root' }]);
  });

  it('rejects an element of the reserved wrapper name', () => {
    const result = tokenizeMarkup('<storage-root>a</storage-root>');
    expect(result.errors[0].message).toBe('Reserved element name: storage-root');
  });

  it('keeps void elements childless', () => {
    const result = tokenizeMarkup('<p>a<br>b</p>');
    const p = element(result.nodes[0]);
    expect(p.children.map((c) => (c.type === 'text' ? c.value : c.name))).toEqual(['a', 'br', 'b']);
    expect(element(p.children[1]).children).toEqual([]);
  });

  it('captures CDATA sections verbatim', () => {
    const result = tokenizeMarkup('<ac:plain-text-body><![CDATA[if (a < b) {}]]></ac:plain-text-body>');
    const body = element(result.nodes[0]);
    expect(body.children).toEqual([{ type: 'text', value: 'if (a < b) {}', cdata: true }]);
  });

  it('decodes HTML entities', () => {
    const result = tokenizeMarkup('<p>a&nbsp;b &amp; c</p>');
    expect(textContent(element(result.nodes[0]))).toBe('a\u00a0b & c');
  });

  it('closes elements left open at end of input', () => {
    const result = tokenizeMarkup('<h1>Unclosed heading');
    expect(result.errors).toHaveLength(0);
    const heading = element(result.nodes[0]);
    expect(heading.name).toBe('h1');
    expect(textContent(heading)).toBe('Unclosed heading');
  });

  it('records source offsets relative to the input', () => {
    const result = tokenizeMarkup('<p>x</p><h1>y</h1>');
    const p = element(result.nodes[0]);
    const h1 = element(result.nodes[1]);
    expect(p.startOffset).toBe(0);
    expect(p.endOffset).toBe(8);
    expect(h1.startOffset).toBe(8);
  });

  it('reports input that ends inside an attribute value', () => {
    const result = tokenizeMarkup('<p title="oops');
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].message).toBe('Unexpected end');
  });

  it('reports an unterminated comment', () => {
    const result = tokenizeMarkup('<p>x</p><!-- never closed');
    expect(result.errors.length).toBeGreaterThan(0);
  });
});
