/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { ConfluenceDocument } from '../document/document';
import { DiagnosticsCollector } from './diagnostics';
import { dispatchRoot } from './dispatcher';
import { DiagnosticsError, MarkupSyntaxError } from './errors';
import { tokenizeMarkup } from './markup-tokenizer';

export interface ParserOptions {
  /** Throw a DiagnosticsError when any diagnostic was recorded. Defaults to true. */
  strict?: boolean;
  logger?: Logger;
}

/**
 * Parser for Confluence storage-format markup.
 *
 * The instance only holds its configuration: every `parse` call starts from
 * a fresh diagnostics collector, so calls never share state.
 */
export class ConfluenceParser {
  readonly strict: boolean;
  private readonly logger: Logger;

  constructor(options: ParserOptions = {}) {
    this.strict = options.strict ?? true;

    if (options.logger) this.logger = options.logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('ConfluenceParser');
  }

  /**
   * Parse markup into a document.
   *
   * @throws MarkupSyntaxError when the markup cannot be tokenized
   * @throws DiagnosticsError in strict mode, when diagnostics were recorded
   */
  parse(markup: string): ConfluenceDocument {
    const tokens = tokenizeMarkup(markup);
    if (tokens.errors.length > 0) {
      const error = new MarkupSyntaxError(tokens.errors);
      this.logger.debug('markup rejected', error.message);
      throw error;
    }

    const collector = new DiagnosticsCollector();
    const built = dispatchRoot(tokens.nodes);
    collector.addAll(built.issues);

    const document = new ConfluenceDocument(built.node, collector.toArray());
    this.logger.debug(`parsed ${markup.length} characters`, {
      root: built.node?.kind,
      diagnostics: collector.size,
    });

    if (this.strict && collector.size > 0) {
      const error = new DiagnosticsError(document.diagnostics);
      this.logger.debug('strict parse rejected', error.message);
      throw error;
    }
    return document;
  }
}
