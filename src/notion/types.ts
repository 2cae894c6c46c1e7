/**
 * Notion block model type definitions.
 *
 * Mirrors the subset of the Notion API block schema this converter emits:
 * rich text runs, the closed set of block types, and each block type's
 * content payload.
 *
 * @see https://developers.notion.com/reference/block
 */

// --- Block types ---

/** Block types produced by the converter. */
export type NotionBlockType =
  | 'paragraph'
  | 'heading_1'
  | 'heading_2'
  | 'heading_3'
  | 'code'
  | 'bulleted_list_item'
  | 'numbered_list_item'
  | 'quote'
  | 'divider'
  | 'table'
  | 'image';

export type HeadingBlockType = 'heading_1' | 'heading_2' | 'heading_3';

export type ListItemBlockType = 'bulleted_list_item' | 'numbered_list_item';

export const NOTION_BLOCK_TYPES: readonly NotionBlockType[] = [
  'paragraph',
  'heading_1',
  'heading_2',
  'heading_3',
  'code',
  'bulleted_list_item',
  'numbered_list_item',
  'quote',
  'divider',
  'table',
  'image',
];

// --- Rich text ---

/** Text and background colors accepted by Notion annotations. */
export type NotionColor =
  | 'default'
  | 'gray'
  | 'brown'
  | 'orange'
  | 'yellow'
  | 'green'
  | 'blue'
  | 'purple'
  | 'pink'
  | 'red'
  | 'gray_background'
  | 'brown_background'
  | 'orange_background'
  | 'yellow_background'
  | 'green_background'
  | 'blue_background'
  | 'purple_background'
  | 'pink_background'
  | 'red_background';

/** Formatting flags of a rich text run. */
export interface NotionAnnotations {
  readonly bold: boolean;
  readonly italic: boolean;
  readonly strikethrough: boolean;
  readonly underline: boolean;
  readonly code: boolean;
  readonly color: NotionColor;
}

export interface NotionLink {
  readonly url: string;
}

export interface NotionTextContent {
  readonly content: string;
  readonly link?: NotionLink;
}

/** A single span of text with its own annotations and optional link. */
export interface NotionRichText {
  readonly type: 'text';
  readonly text: NotionTextContent;
  readonly annotations: NotionAnnotations;
}

/** Annotation overrides applied on top of the defaults. */
export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  strikethrough?: boolean;
  underline?: boolean;
  code?: boolean;
  color?: NotionColor;
  link?: NotionLink;
}

// --- Block content payloads ---

export interface RichTextContent {
  readonly rich_text: readonly NotionRichText[];
}

export interface CodeContent extends RichTextContent {
  readonly language: string;
}

export interface ListItemContent extends RichTextContent {
  /** Nested blocks; present only when non-empty. */
  readonly children?: readonly NotionBlock[];
}

/** One row of a table: a list of cells, each a list of rich text runs. */
export interface NotionTableRow {
  readonly type: 'table_row';
  readonly table_row: {
    readonly cells: readonly (readonly NotionRichText[])[];
  };
}

export interface TableContent {
  readonly table_width: number;
  readonly has_column_header: boolean;
  readonly has_row_header: boolean;
  readonly children: readonly NotionTableRow[];
}

export interface ImageContent {
  readonly type: 'external';
  readonly external: { readonly url: string };
}

export type DividerContent = Record<string, never>;

/** Content payload for each block type. */
export interface BlockContentMap {
  paragraph: RichTextContent;
  heading_1: RichTextContent;
  heading_2: RichTextContent;
  heading_3: RichTextContent;
  code: CodeContent;
  bulleted_list_item: ListItemContent;
  numbered_list_item: ListItemContent;
  quote: RichTextContent;
  divider: DividerContent;
  table: TableContent;
  image: ImageContent;
}

/**
 * A converted block. `content` is the payload that the wire format stores
 * under a key named after `type`.
 */
export interface NotionBlock<K extends NotionBlockType = NotionBlockType> {
  readonly object: 'block';
  readonly type: K;
  readonly content: BlockContentMap[K];
}

/**
 * Wire-format block: the block type appears both as `type` and as the key
 * holding the type-specific payload.
 *
 * @example
 * ```json
 * { "object": "block", "type": "divider", "divider": {} }
 * ```
 */
export interface NotionApiBlock {
  object: 'block';
  type: NotionBlockType;
  [contentKey: string]: unknown;
}
