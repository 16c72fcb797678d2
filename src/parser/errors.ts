/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { formatDiagnostic } from './diagnostics';
import type { Diagnostic } from './diagnostics';
import type { TokenizeError } from './types';

/**
 * Base class of everything `parse` throws.
 */
export class ParseError extends Error {
  /** Diagnostic strings (`code:subject`) recorded before the failure. */
  readonly diagnostics: readonly string[];

  constructor(message: string, diagnostics: readonly string[] = []) {
    super(message);
    this.name = 'ParseError';
    this.diagnostics = Object.freeze([...diagnostics]);
  }
}

/**
 * The markup could not be tokenized at all; no tree was built.
 */
export class MarkupSyntaxError extends ParseError {
  readonly errors: readonly TokenizeError[];

  constructor(errors: readonly TokenizeError[]) {
    const first = errors[0];
    super(
      first
        ? `Malformed markup at line ${first.line + 1}, column ${first.column + 1}: ${first.message}`
        : 'Malformed markup'
    );
    this.name = 'MarkupSyntaxError';
    this.errors = Object.freeze([...errors]);
  }
}

/**
 * Raised by a strict parser once the tree is built, when any diagnostic was
 * recorded.
 */
export class DiagnosticsError extends ParseError {
  readonly records: readonly Diagnostic[];

  constructor(records: readonly Diagnostic[]) {
    const diagnostics = records.map(formatDiagnostic);
    super(`${diagnostics.length} diagnostic(s) recorded: ${diagnostics.join(', ')}`, diagnostics);
    this.name = 'DiagnosticsError';
    this.records = Object.freeze([...records]);
  }
}
