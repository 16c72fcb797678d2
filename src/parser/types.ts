/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Generic element forest produced by the tokenizer, before any dispatch.
*/

export interface MarkupElement {
  readonly type: 'element';
  /** Qualified, lower-cased tag name, e.g. 'ac:structured-macro'. */
  readonly name: string;
  /** Qualified tag name as written in the source. */
  readonly rawName: string;
  readonly attributes: Readonly<Record<string, string>>;
  /** Element and text children in document order. */
  readonly children: readonly MarkupNode[];
  /** Character offset of the opening tag in the source. */
  readonly startOffset: number;
  /** Character offset just past the closing tag (end of input when never closed). */
  readonly endOffset: number;
}

export interface MarkupText {
  readonly type: 'text';
  readonly value: string;
  /** True when (part of) the run came from a CDATA section. */
  readonly cdata: boolean;
}

export type MarkupNode = MarkupElement | MarkupText;

export interface TokenizeError {
  line: number;
  column: number;
  message: string;
}

/**
 * Result of tokenizing: the top-level forest and any unrecoverable errors.
 */
export interface TokenizeResult {
  /** Top-level elements and text runs in document order. */
  nodes: MarkupNode[];
  /** Errors (line, column, message). Non-empty means the input is unusable. */
  errors: TokenizeError[];
}
