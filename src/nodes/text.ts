/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Canonical plain-text rendering of the content tree.
*/

import { assertNever, isBlockLevel } from './tree';
import type {
  DecisionList,
  LinkElement,
  ListElement,
  ListItem,
  Node,
  PanelMacro,
  PanelType,
  ResourceIdentifier,
  Table,
  TableRow,
} from './types';

const BLOCK_SEPARATOR = '\n\n';
const CELL_SEPARATOR = ' | ';

const PANEL_LABELS: Record<PanelType, string> = {
  panel: '📋 PANEL',
  note: '📝 NOTE',
  success: '✅ SUCCESS',
  warning: '⚠️ WARNING',
  error: '❌ ERROR',
  info: 'ℹ️ INFO',
};

function singleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function labelled(label: string, detail: string | undefined): string {
  return detail ? `${label}: ${detail}` : label;
}

/** Containers take part in their parent's joining as if they were not there. */
function* joinable(children: readonly Node[]): Generator<Node, void, undefined> {
  for (const child of children) {
    if (child.kind === 'container') yield* joinable(child.children);
    else yield child;
  }
}

/**
 * Generic joining: inline renderings are concatenated, a block rendering is
 * separated from its neighbours by one blank line. Whitespace-only inline
 * renderings only survive between two inline renderings.
 */
export function joinChildren(children: readonly Node[]): string {
  let out = '';
  let pendingSpace = '';
  let previousBlock = false;
  for (const child of joinable(children)) {
    const text = toText(child);
    if (text === '') continue;
    const block = isBlockLevel(child);
    if (!block && text.trim() === '') {
      if (out !== '' && !previousBlock) pendingSpace += text;
      continue;
    }
    if (out !== '' && (block || previousBlock)) out += BLOCK_SEPARATOR;
    else out += pendingSpace;
    pendingSpace = '';
    out += text;
    previousBlock = block;
  }
  return out;
}

function listMarker(list: ListElement, item: ListItem, position: number): string {
  switch (list.listType) {
    case 'ordered':
      return `${(list.start ?? 1) + position}. `;
    case 'task':
      return item.status === 'complete' ? '✓ ' : '○ ';
    case 'unordered':
      return '• ';
    default:
      return assertNever(list.listType, 'list type');
  }
}

function renderList(list: ListElement): string {
  const lines: string[] = [];
  list.children.forEach((item, position) => {
    const itemLines = toText(item)
      .split('\n')
      .map((line) => line.trimEnd())
      .filter((line) => line.trim() !== '');
    const marker = listMarker(list, item, position);
    if (itemLines.length === 0) {
      lines.push(marker.trimEnd());
      return;
    }
    lines.push(marker + itemLines[0].trim());
    for (const line of itemLines.slice(1)) lines.push(`  ${line}`);
  });
  return lines.join('\n');
}

function renderRow(row: TableRow): string {
  if (row.children.length === 0) return '';
  return row.children.map((cell) => singleLine(joinChildren(cell.children))).join(CELL_SEPARATOR);
}

function renderTable(table: Table): string {
  return table.children
    .map(renderRow)
    .filter((line) => line !== '')
    .join('\n');
}

function renderDecisionList(list: DecisionList): string {
  return list.children.map((item) => toText(item)).join('\n');
}

function renderPanel(panel: PanelMacro): string {
  const body = singleLine(joinChildren(panel.children));
  if (panel.panelType === 'panel' && panel.panelIconText) {
    return body ? `${panel.panelIconText} ${body}` : panel.panelIconText;
  }
  return labelled(PANEL_LABELS[panel.panelType], body);
}

/**
 * A link reads as its body text; a link without body reads as its resource
 * references and, failing that, as its href.
 */
function renderLink(link: LinkElement): string {
  const resources: string[] = [];
  const body: Node[] = [];
  for (const child of link.children) {
    if (child.kind === 'resource-identifier') resources.push(toText(child));
    else body.push(child);
  }
  const bodyText = joinChildren(body).trim();
  if (bodyText) return bodyText;
  if (resources.length > 0) return resources.join(' ');
  return link.href ?? '';
}

export function renderResource(resource: ResourceIdentifier): string {
  switch (resource.resourceType) {
    case 'page':
      return labelled('📄 Page', resource.contentTitle);
    case 'blog-post': {
      if (resource.contentTitle && resource.postingDay) {
        return `📝 Blog: ${resource.contentTitle} (${resource.postingDay})`;
      }
      return labelled('📝 Blog', resource.contentTitle ?? resource.postingDay);
    }
    case 'attachment':
      return labelled('📎 Attachment', resource.filename);
    case 'url':
      return labelled('🔗 URL', resource.value);
    case 'user':
      return labelled('👤 User', resource.accountId ?? resource.userkey);
    case 'space':
      return labelled('🏠 Space', resource.spaceKey);
    case 'shortcut': {
      const target =
        resource.key && resource.parameter ? `${resource.key}@${resource.parameter}` : resource.key;
      return labelled('🔗 Shortcut', target);
    }
    case 'content-entity':
      return labelled('📄 Content', resource.contentId);
    default:
      return assertNever(resource.resourceType, 'resource type');
  }
}

/**
 * Plain text of a subtree. Pure; recomputed on every call.
 */
export function toText(node: Node): string {
  switch (node.kind) {
    case 'text':
      return node.text;
    case 'image': {
      const label = `🖼️ Image: ${node.alt ?? node.filename ?? node.src ?? 'Unknown'}`;
      const caption = singleLine(joinChildren(node.children));
      return caption ? `${label} - ${caption}` : label;
    }
    case 'emoticon':
      return node.emojiFallback ?? node.emojiShortname ?? (node.name ? `:${node.name}:` : '');
    case 'time':
      return node.datetime ? `📅 ${node.datetime}` : '📅 Date';
    case 'placeholder':
      return labelled('Placeholder', node.text);
    case 'text-break':
      if (node.breakType === 'line-break') return '\n';
      if (node.breakType === 'horizontal-rule') return '';
      return joinChildren(node.children);
    case 'list':
      return renderList(node);
    case 'table':
      return renderTable(node);
    case 'table-row':
      return renderRow(node);
    case 'decision-list':
      return renderDecisionList(node);
    case 'decision-list-item': {
      const icon = node.state === 'decided' ? '✅' : '⏳';
      const body = singleLine(joinChildren(node.children));
      return body ? `${icon} ${body}` : icon;
    }
    case 'link':
      return renderLink(node);
    case 'resource-identifier':
      return renderResource(node);
    case 'panel-macro':
      return renderPanel(node);
    case 'code-macro':
      return node.code;
    case 'status-macro': {
      const status = `🏷️ Status: ${node.title ?? 'Status'}`;
      return node.colour ? `${status} (${node.colour})` : status;
    }
    case 'toc-macro':
      return '📑 Table of Contents';
    case 'jira-macro':
      if (node.key) {
        return node.server && node.server !== 'System Jira' ? `🎫 ${node.key} (${node.server})` : `🎫 ${node.key}`;
      }
      return node.jqlQuery ? `🎫 JIRA Query: ${node.jqlQuery}` : '🎫 JIRA Issue';
    case 'include-macro':
      return node.contentTitle ? `📄 Include: ${node.contentTitle}` : '📄 Include Page';
    case 'excerpt-include-macro':
      if (!node.contentTitle) return '📝 Excerpt Include';
      return node.postingDay
        ? `📝 Excerpt: ${node.contentTitle} (${node.postingDay})`
        : `📝 Excerpt: ${node.contentTitle}`;
    case 'tasks-report-macro':
      return labelled('📊 Tasks Report', node.spaces);
    case 'attachments-macro':
      return labelled('📎 Attachments', node.patterns);
    case 'view-pdf-macro':
      return node.filename ? `📄 PDF: ${node.filename}` : '📄 PDF Viewer';
    case 'view-file-macro':
      return node.filename ? `📁 File: ${node.filename}` : '📁 File Viewer';
    case 'profile-macro':
      return node.accountId ? `👤 Profile: ${node.accountId}` : '👤 User Profile';
    case 'anchor-macro':
      return labelled('⚓ Anchor', node.anchorName);
    case 'excerpt-macro':
      return labelled('📄 Excerpt', singleLine(joinChildren(node.children)));
    case 'text-effect':
    case 'heading':
    case 'list-item':
    case 'table-cell':
    case 'layout':
    case 'layout-section':
    case 'layout-cell':
    case 'expand-macro':
    case 'details-macro':
    case 'container':
    case 'fragment':
      return joinChildren(node.children);
    default:
      return assertNever(node, 'node kind');
  }
}
