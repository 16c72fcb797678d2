/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect, vi } from 'vitest';
import { ConfluenceParser } from './parser';
import { DiagnosticsError, MarkupSyntaxError, ParseError } from './errors';
import { toText } from '../nodes/text';

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

describe('ConfluenceParser', () => {
  const lenient = new ConfluenceParser({ strict: false });

  it('is strict unless configured otherwise', () => {
    expect(new ConfluenceParser().strict).toBe(true);
    expect(lenient.strict).toBe(false);
  });

  it('flattens inline formatting and separates blocks by a blank line', () => {
    const document = new ConfluenceParser().parse(
      '<p>Hello <strong>world</strong>!</p><h1>Main Heading</h1><p>Some paragraph text with <em>emphasis</em>.</p>'
    );
    expect(document.text).toBe('Hello world!\n\nMain Heading\n\nSome paragraph text with emphasis.');
  });

  it('renders an info panel with its label', () => {
    const document = new ConfluenceParser().parse(
      '<ac:structured-macro ac:name="info"><ac:rich-text-body>' +
        '<p>This is an info panel with <strong>important</strong> information.</p>' +
        '</ac:rich-text-body></ac:structured-macro>'
    );
    expect(document.text).toBe('ℹ️ INFO: This is an info panel with important information.');
  });

  it('finds headings in document order', () => {
    const document = new ConfluenceParser().parse('<h1>Main Title</h1><h2>Subtitle</h2>');
    const [headings] = document.findAll('heading');
    expect(headings.map((heading) => toText(heading))).toEqual(['Main Title', 'Subtitle']);
  });

  it('returns diagnostics for unknown constructs when lenient', () => {
    const document = lenient.parse(
      '<p>a<blink>b</blink></p><ac:structured-macro ac:name="gallery"><ac:rich-text-body><p>c</p>' +
        '</ac:rich-text-body></ac:structured-macro>'
    );
    expect(document.metadata.diagnostics).toEqual(['unknown_element:blink', 'unknown_macro:gallery']);
    expect(document.text).toBe('ab\n\nc');
  });

  it('raises the recorded diagnostics when strict', () => {
    const error = captureError(() => new ConfluenceParser().parse('<blink>x</blink><p>ok</p>'));
    expect(error).toBeInstanceOf(DiagnosticsError);
    expect(error).toBeInstanceOf(ParseError);
    if (!(error instanceof DiagnosticsError)) return;
    expect(error.name).toBe('DiagnosticsError');
    expect(error.diagnostics).toEqual(['unknown_element:blink']);
    expect(error.records[0]).toEqual({ code: 'unknown_element', subject: 'blink', offset: 0 });
    expect(error.message).toBe('1 diagnostic(s) recorded: unknown_element:blink');
  });

  it('accepts an unclosed element under either policy', () => {
    const strictDocument = new ConfluenceParser().parse('<h1>Unclosed heading');
    expect(strictDocument.text).toBe('Unclosed heading');
    const lenientDocument = lenient.parse('<h1>Unclosed heading');
    expect(Array.isArray(lenientDocument.metadata.diagnostics)).toBe(true);
    expect(lenientDocument.root?.kind).toBe('heading');
  });

  it('rejects markup that cannot be tokenized under either policy', () => {
    for (const parser of [new ConfluenceParser(), lenient]) {
      const error = captureError(() => parser.parse('<p title="oops'));
      expect(error).toBeInstanceOf(MarkupSyntaxError);
      if (!(error instanceof MarkupSyntaxError)) return;
      expect(error.diagnostics).toEqual([]);
      expect(error.errors[0].message).toBe('Unexpected end');
    }
  });

  it('separates words split by indentation between inline elements', () => {
    expect(lenient.parse('<p><strong>Bold</strong>\n<em>italic</em></p>').text).toBe('Bold italic');
  });

  it('reports a mixed-case unknown element verbatim', () => {
    expect(lenient.parse('<MyTag>x</MyTag>').metadata.diagnostics).toEqual(['unknown_element:MyTag']);
  });

  it('keeps the text of script elements', () => {
    const document = lenient.parse('<script>a &lt; b</script>');
    expect(document.metadata.diagnostics).toEqual(['unknown_element:script']);
    expect(document.text).toBe('a &lt; b');
  });

  it('reports a list start beyond the safe integer range', () => {
    const document = lenient.parse('<ol start="99999999999999999999999"><li>a</li></ol>');
    expect(document.metadata.diagnostics).toEqual(['invalid_attribute:ol@start=99999999999999999999999']);
    expect(document.text).toBe('1. a');
  });

  it('rejects markup that closes the reserved wrapper element', () => {
    const error = captureError(() => lenient.parse('<p>a</p></storage-root><p>b</p>'));
    expect(error).toBeInstanceOf(MarkupSyntaxError);
    if (!(error instanceof MarkupSyntaxError)) return;
    expect(error.message).toBe('Malformed markup at line 1, column 24: Reserved element name: storage-root');
  });

  it('starts every call with fresh diagnostics', () => {
    const first = lenient.parse('<blink/>');
    const second = lenient.parse('<blink/>');
    expect(first.metadata.diagnostics).toEqual(['unknown_element:blink']);
    expect(second.metadata.diagnostics).toEqual(['unknown_element:blink']);
    expect(lenient.parse('<p>clean</p>').metadata.diagnostics).toEqual([]);
  });

  it('logs through a clone of the given logger', () => {
    const logger = {
      clone: vi.fn(),
      setContext: vi.fn(),
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    logger.clone.mockReturnValue(logger);
    new ConfluenceParser({ logger }).parse('<p>x</p>');
    expect(logger.clone).toHaveBeenCalledTimes(1);
    expect(logger.setContext).toHaveBeenCalledWith('ConfluenceParser');
    expect(logger.debug).toHaveBeenCalledWith('parsed 8 characters', { root: 'text-break', diagnostics: 0 });
  });
});
