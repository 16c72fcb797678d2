/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { assertNever } from './tree';
import type { LinkElement, ResourceIdentifier } from './types';

function versionSuffix(version: string | undefined): string {
  return version !== undefined ? `@v${version}` : '';
}

/**
 * Stable URI for a resource reference, e.g. `page://DOC/User Guide@v3`.
 * Undefined when the reference lacks the fields that identify its target.
 */
export function canonicalUri(resource: ResourceIdentifier): string | undefined {
  switch (resource.resourceType) {
    case 'page':
      if (!resource.contentTitle) return undefined;
      return `page://${resource.spaceKey ?? ''}/${resource.contentTitle}${versionSuffix(resource.versionAtSave)}`;
    case 'blog-post':
      if (!resource.contentTitle) return undefined;
      return `blog://${resource.spaceKey ?? ''}/${resource.contentTitle}@${resource.postingDay ?? ''}`;
    case 'attachment':
      if (!resource.filename) return undefined;
      return `attach://${resource.filename}${versionSuffix(resource.versionAtSave)}`;
    case 'url':
      return resource.value;
    case 'user':
      return resource.accountId ? `user://${resource.accountId}` : undefined;
    case 'space':
      return resource.spaceKey ? `space://${resource.spaceKey}` : undefined;
    case 'content-entity':
      return resource.contentId ? `contentid://${resource.contentId}` : undefined;
    case 'shortcut':
      if (!resource.key || !resource.parameter) return undefined;
      return `shortcut://${resource.key}/${resource.parameter}`;
    default:
      return assertNever(resource.resourceType, 'resource type');
  }
}

/**
 * Target of a link: the first resolvable resource reference, else the href,
 * else the anchor as `#name`.
 */
export function linkTarget(link: LinkElement): string | undefined {
  for (const child of link.children) {
    if (child.kind !== 'resource-identifier') continue;
    const uri = canonicalUri(child);
    if (uri !== undefined) return uri;
  }
  if (link.href) return link.href;
  return link.anchor ? `#${link.anchor}` : undefined;
}
