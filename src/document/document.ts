/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { formatDiagnostic } from '../parser/diagnostics';
import type { Diagnostic } from '../parser/diagnostics';
import { findAll, findAllOf, walk } from '../nodes/tree';
import { toText } from '../nodes/text';
import type { Node, NodeSelector, SelectedNode } from '../nodes/types';

export interface DocumentMetadata {
  /** Diagnostic strings (`code:subject`) in the order they were recorded. */
  readonly diagnostics: readonly string[];
}

/**
 * Result of one parse call. Immutable once constructed.
 */
export class ConfluenceDocument {
  /** Root node; undefined for input without content. */
  readonly root: Node | undefined;
  readonly metadata: DocumentMetadata;
  /** Structured form of `metadata.diagnostics`, offsets included. */
  readonly diagnostics: readonly Diagnostic[];

  constructor(root: Node | undefined, diagnostics: readonly Diagnostic[] = []) {
    this.root = root;
    this.diagnostics = Object.freeze([...diagnostics]);
    this.metadata = Object.freeze({ diagnostics: Object.freeze(this.diagnostics.map(formatDiagnostic)) });
    Object.freeze(this);
  }

  /** Plain text of the whole document, empty without a root. */
  get text(): string {
    return this.root ? toText(this.root) : '';
  }

  walk(): Iterable<Node> {
    return this.root ? walk(this.root) : [];
  }

  findAll<S extends NodeSelector>(...selectors: S[]): Array<Array<SelectedNode<S>>> {
    if (!this.root) return selectors.map(() => []);
    return findAll(this.root, ...selectors);
  }

  findAllOf<S extends NodeSelector>(selector: S): Array<SelectedNode<S>> {
    return this.root ? findAllOf(this.root, selector) : [];
  }
}
