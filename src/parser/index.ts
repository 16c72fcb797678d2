/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { ConfluenceParser } from './parser';
export { ParseError, MarkupSyntaxError, DiagnosticsError } from './errors';
export { DiagnosticsCollector, diagnostic, formatDiagnostic } from './diagnostics';
export { tokenizeMarkup, textContent } from './markup-tokenizer';
export { MACRO_RULES } from './macro-registry';
export type { ParserOptions } from './parser';
export type { Built, BuiltList, Diagnostic, DiagnosticCode } from './diagnostics';
export type { MarkupElement, MarkupNode, MarkupText, TokenizeError, TokenizeResult } from './types';
