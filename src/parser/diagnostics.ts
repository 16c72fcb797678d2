/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type DiagnosticCode =
  | 'unknown_element'
  | 'unknown_macro'
  | 'unknown_adf_node'
  | 'missing_attribute'
  | 'invalid_attribute'
  | 'missing_parameter'
  | 'invalid_parameter'
  | 'unexpected_child';

/**
 * A recoverable irregularity met while building the tree.
 */
export interface Diagnostic {
  readonly code: DiagnosticCode;
  /** What the diagnostic is about: a tag, a macro name, `tag@attribute`, `macro/parameter`. */
  readonly subject: string;
  /** Character offset of the offending element in the source. */
  readonly offset?: number;
}

export function diagnostic(code: DiagnosticCode, subject: string, offset?: number): Diagnostic {
  return Object.freeze(offset === undefined ? { code, subject } : { code, subject, offset });
}

/** String form used in document metadata, e.g. `unknown_macro:gallery`. */
export function formatDiagnostic(record: Diagnostic): string {
  return `${record.code}:${record.subject}`;
}

/**
 * Result of one construction step: the node plus the issues found while
 * building it and its descendants, in pre-order.
 */
export interface Built<T> {
  readonly node: T;
  readonly issues: readonly Diagnostic[];
}

export interface BuiltList<T> {
  readonly nodes: T[];
  readonly issues: readonly Diagnostic[];
}

/**
 * Append-only accumulator for the diagnostics of a single parse call.
 */
export class DiagnosticsCollector {
  private readonly records: Diagnostic[] = [];

  addAll(records: Iterable<Diagnostic>): void {
    for (const record of records) this.records.push(record);
  }

  get size(): number {
    return this.records.length;
  }

  /** Frozen snapshot of the records collected so far. */
  toArray(): readonly Diagnostic[] {
    return Object.freeze([...this.records]);
  }
}
