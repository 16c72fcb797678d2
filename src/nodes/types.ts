/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Content tree built from storage-format markup. Every node is a plain frozen
  object discriminated by `kind`.
*/

export const TEXT_EFFECTS = [
  'strong',
  'emphasis',
  'underline',
  'strikethrough',
  'monospace',
  'subscript',
  'superscript',
  'blockquote',
  'span',
] as const;
export type TextEffect = (typeof TEXT_EFFECTS)[number];

export const TEXT_BREAKS = ['paragraph', 'line-break', 'horizontal-rule'] as const;
export type TextBreak = (typeof TEXT_BREAKS)[number];

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export const LIST_TYPES = ['unordered', 'ordered', 'task'] as const;
export type ListType = (typeof LIST_TYPES)[number];

export const TASK_STATUSES = ['complete', 'incomplete'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const DECISION_STATES = ['decided', 'pending'] as const;
export type DecisionState = (typeof DECISION_STATES)[number];

export const LAYOUT_SECTION_TYPES = [
  'single',
  'fixed-width',
  'two_equal',
  'two_left_sidebar',
  'two_right_sidebar',
  'three_equal',
  'three_with_sidebars',
  'three_left_sidebars',
  'three_right_sidebars',
  'four_equal',
  'five_equal',
] as const;
export type LayoutSectionType = (typeof LAYOUT_SECTION_TYPES)[number];

export const BREAKOUT_MODES = ['default', 'wide', 'full-width'] as const;
export type BreakoutMode = (typeof BREAKOUT_MODES)[number];

export const LINK_TYPES = [
  'external',
  'mailto',
  'space',
  'page',
  'blog-post',
  'user',
  'attachment',
  'anchor',
] as const;
export type LinkType = (typeof LINK_TYPES)[number];

export const RESOURCE_TYPES = [
  'page',
  'blog-post',
  'attachment',
  'url',
  'shortcut',
  'user',
  'space',
  'content-entity',
] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const PANEL_TYPES = ['panel', 'note', 'success', 'warning', 'error', 'info'] as const;
export type PanelType = (typeof PANEL_TYPES)[number];

interface NodeBase<K extends string> {
  readonly kind: K;
}

interface ParentNode<K extends string, C extends Node = Node> extends NodeBase<K> {
  readonly children: readonly C[];
}

interface MacroBase<K extends string> extends NodeBase<K> {
  /** Value of `ac:macro-id`, when the macro carries one. */
  readonly macroId?: string;
}

interface MacroParent<K extends string> extends MacroBase<K> {
  readonly children: readonly Node[];
}

// Leaf content

export interface Text extends NodeBase<'text'> {
  readonly text: string;
}

export interface Image extends ParentNode<'image'> {
  readonly src?: string;
  readonly filename?: string;
  readonly alt?: string;
  readonly title?: string;
  readonly width?: string;
  readonly height?: string;
}

export interface Emoticon extends NodeBase<'emoticon'> {
  readonly name?: string;
  readonly emojiShortname?: string;
  readonly emojiId?: string;
  readonly emojiFallback?: string;
}

export interface Time extends NodeBase<'time'> {
  readonly datetime?: string;
}

export interface PlaceholderElement extends NodeBase<'placeholder'> {
  readonly placeholderType?: string;
  readonly text: string;
}

// Text formatting

export interface TextEffectElement extends ParentNode<'text-effect'> {
  readonly effect: TextEffect;
  /** Inline style of a `span`. */
  readonly style?: string;
}

export interface TextBreakElement extends ParentNode<'text-break'> {
  readonly breakType: TextBreak;
}

// Structure

export interface HeadingElement extends ParentNode<'heading'> {
  readonly level: HeadingLevel;
}

export interface ListElement extends ParentNode<'list', ListItem> {
  readonly listType: ListType;
  readonly start?: number;
}

export interface ListItem extends ParentNode<'list-item'> {
  readonly taskId?: string;
  readonly uuid?: string;
  readonly status?: TaskStatus;
}

export interface DecisionList extends ParentNode<'decision-list', DecisionListItem> {
  readonly localId?: string;
}

export interface DecisionListItem extends ParentNode<'decision-list-item'> {
  readonly localId?: string;
  readonly state?: DecisionState;
}

// Tables

export interface Table extends ParentNode<'table', TableRow> {
  readonly width?: number;
  readonly layout?: string;
  readonly localId?: string;
  readonly displayMode?: string;
}

export type TableRow = ParentNode<'table-row', TableCell>;

export interface TableCell extends ParentNode<'table-cell'> {
  readonly isHeader: boolean;
  readonly rowspan: number;
  readonly colspan: number;
}

// Layout

export type LayoutElement = ParentNode<'layout', LayoutSection>;

export interface LayoutSection extends ParentNode<'layout-section', LayoutCell> {
  readonly sectionType?: LayoutSectionType;
  readonly breakoutMode?: BreakoutMode;
  readonly breakoutWidth?: number;
}

export type LayoutCell = ParentNode<'layout-cell'>;

// Links and resource references

export interface LinkElement extends ParentNode<'link'> {
  readonly linkType: LinkType;
  readonly href?: string;
  readonly anchor?: string;
  readonly cardAppearance?: string;
}

export interface ResourceIdentifier extends NodeBase<'resource-identifier'> {
  readonly resourceType: ResourceType;
  readonly contentTitle?: string;
  readonly spaceKey?: string;
  readonly versionAtSave?: string;
  readonly postingDay?: string;
  readonly filename?: string;
  readonly contentId?: string;
  readonly value?: string;
  readonly key?: string;
  readonly parameter?: string;
  readonly accountId?: string;
  readonly userkey?: string;
  readonly localId?: string;
}

// Macros

export interface PanelMacro extends MacroParent<'panel-macro'> {
  readonly panelType: PanelType;
  readonly title?: string;
  readonly bgColor?: string;
  readonly borderStyle?: string;
  readonly borderColor?: string;
  readonly titleBgColor?: string;
  readonly titleColor?: string;
  readonly panelIcon?: string;
  readonly panelIconId?: string;
  readonly panelIconText?: string;
}

export interface CodeMacro extends MacroBase<'code-macro'> {
  readonly language?: string;
  readonly title?: string;
  readonly collapse: boolean;
  readonly lineNumbers: boolean;
  readonly theme?: string;
  readonly code: string;
}

export interface StatusMacro extends MacroBase<'status-macro'> {
  readonly title?: string;
  readonly colour?: string;
  readonly subtle: boolean;
}

export interface ExpandMacro extends MacroParent<'expand-macro'> {
  readonly title?: string;
}

export interface DetailsMacro extends MacroParent<'details-macro'> {
  readonly title?: string;
  readonly id?: string;
  readonly hidden: boolean;
}

export interface TocMacro extends MacroBase<'toc-macro'> {
  readonly style?: string;
  readonly minLevel?: number;
  readonly maxLevel?: number;
  readonly type?: string;
  readonly outline: boolean;
  readonly include?: string;
  readonly exclude?: string;
}

export interface JiraMacro extends MacroBase<'jira-macro'> {
  readonly key?: string;
  readonly server?: string;
  readonly serverId?: string;
  readonly jqlQuery?: string;
  readonly maximumIssues?: number;
}

export interface IncludeMacro extends MacroBase<'include-macro'> {
  readonly contentTitle?: string;
  readonly spaceKey?: string;
}

export interface ExcerptIncludeMacro extends MacroBase<'excerpt-include-macro'> {
  readonly contentTitle?: string;
  readonly spaceKey?: string;
  readonly postingDay?: string;
  readonly noPanel: boolean;
}

export interface TasksReportMacro extends MacroBase<'tasks-report-macro'> {
  readonly spaces?: string;
  readonly labels?: string;
  readonly status?: string;
  readonly pageSize?: number;
  readonly isMissingRequiredParameters: boolean;
}

export interface AttachmentsMacro extends MacroBase<'attachments-macro'> {
  readonly patterns?: string;
  readonly sortBy?: string;
  readonly upload: boolean;
  readonly old: boolean;
}

export interface ViewPdfMacro extends MacroBase<'view-pdf-macro'> {
  readonly filename?: string;
  readonly versionAtSave?: string;
  readonly width?: string;
  readonly height?: string;
}

export interface ViewFileMacro extends MacroBase<'view-file-macro'> {
  readonly filename?: string;
  readonly versionAtSave?: string;
  readonly height?: string;
}

export interface ProfileMacro extends MacroBase<'profile-macro'> {
  readonly accountId?: string;
}

export interface AnchorMacro extends MacroBase<'anchor-macro'> {
  readonly anchorName?: string;
}

export interface ExcerptMacro extends MacroParent<'excerpt-macro'> {
  readonly name?: string;
  readonly hidden: boolean;
}

// Utility

/** Pass-through container for unknown or neutral markup. */
export interface Container extends ParentNode<'container'> {
  /** Qualified tag name of the source element. */
  readonly tag: string;
}

/** Synthetic root holding several top-level siblings. */
export type Fragment = ParentNode<'fragment'>;

export type MacroNode =
  | PanelMacro
  | CodeMacro
  | StatusMacro
  | ExpandMacro
  | DetailsMacro
  | TocMacro
  | JiraMacro
  | IncludeMacro
  | ExcerptIncludeMacro
  | TasksReportMacro
  | AttachmentsMacro
  | ViewPdfMacro
  | ViewFileMacro
  | ProfileMacro
  | AnchorMacro
  | ExcerptMacro;

export type Node =
  | Text
  | Image
  | Emoticon
  | Time
  | PlaceholderElement
  | TextEffectElement
  | TextBreakElement
  | HeadingElement
  | ListElement
  | ListItem
  | DecisionList
  | DecisionListItem
  | Table
  | TableRow
  | TableCell
  | LayoutElement
  | LayoutSection
  | LayoutCell
  | LinkElement
  | ResourceIdentifier
  | MacroNode
  | Container
  | Fragment;

export type NodeKind = Node['kind'];
export type MacroKind = MacroNode['kind'];

export const MACRO_KINDS: readonly MacroKind[] = [
  'panel-macro',
  'code-macro',
  'status-macro',
  'expand-macro',
  'details-macro',
  'toc-macro',
  'jira-macro',
  'include-macro',
  'excerpt-include-macro',
  'tasks-report-macro',
  'attachments-macro',
  'view-pdf-macro',
  'view-file-macro',
  'profile-macro',
  'anchor-macro',
  'excerpt-macro',
];

/** Capability selectors accepted next to node kinds by `findAll`. */
export type NodeCapability = 'macro' | 'block' | 'inline';

export type NodeSelector = NodeKind | NodeCapability;

type SelectedKind<S extends NodeSelector> = S extends NodeKind
  ? S
  : S extends 'macro'
    ? MacroKind
    : NodeKind;

/** Node type picked out by a selector. */
export type SelectedNode<S extends NodeSelector> = Extract<Node, { readonly kind: SelectedKind<S> }>;
