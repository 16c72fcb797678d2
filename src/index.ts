/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './parser';
export { ConfluenceDocument } from './document/document';
export type { DocumentMetadata } from './document/document';
export { toText } from './nodes/text';
export { canonicalUri, linkTarget } from './nodes/resource';
export { findAll, findAllOf, getChildren, isBlockLevel, isMacroNode, matchesSelector, walk } from './nodes/tree';
export * from './nodes/types';
export { ConsoleLogger } from './common/console-logger';
export { LOG_LEVELS } from './common/logger';
export type { Logger, LogLevel } from './common/logger';
