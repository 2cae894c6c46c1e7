/**
 * Markdown token to Notion block converters.
 *
 * One converter per block token type. Each takes a token plus the
 * {@link ConversionContext} of the current walk and returns zero, one or
 * many blocks.
 *
 * @module block-converter
 */

import type { MarkdownToken } from '../core/types.js';
import type {
  BlockContentMap,
  HeadingBlockType,
  ListItemBlockType,
  ListItemContent,
  NotionBlock,
  NotionBlockType,
  NotionRichText,
} from './types.js';
import { formatInlineTokens, makeRichText } from './inline-formatter.js';
import { resolveCodeLanguage } from './languages.js';
import { buildTableContent } from './table-builder.js';

// ---------------------------------------------------------------------------
// Converter contract
// ---------------------------------------------------------------------------

/** What a converter may return. `null` means the token produces no block. */
export type ConverterOutput = NotionBlock | NotionBlock[] | null;

/**
 * Capabilities a converter receives from the walk that invoked it.
 */
export interface ConversionContext {
  /** Convert nested tokens with the same options as the current walk. */
  convertBlocks(tokens: readonly MarkdownToken[]): NotionBlock[];
}

export type BlockConverter = (
  token: MarkdownToken,
  context: ConversionContext,
) => ConverterOutput;

/**
 * Create a frozen block record.
 */
export function makeBlock<K extends NotionBlockType>(
  type: K,
  content: BlockContentMap[K],
): NotionBlock<K> {
  const block: NotionBlock<K> = { object: 'block', type, content };
  return Object.freeze(block);
}

// ---------------------------------------------------------------------------
// Converters
// ---------------------------------------------------------------------------

/**
 * Paragraph (and `block_text`). A paragraph wrapping exactly one image
 * becomes an image block.
 */
export const convertParagraph: BlockConverter = (token, context) => {
  const children = token.children ?? [];

  if (children.length === 1 && children[0].type === 'image') {
    return convertImage(children[0], context);
  }

  return makeBlock('paragraph', { rich_text: formatInlineTokens(children) });
};

/**
 * Heading. Notion has three heading levels; deeper headings become
 * `heading_3`.
 */
export const convertHeading: BlockConverter = (token) => {
  const level = resolveHeadingLevel(token);
  return makeBlock(headingBlockType(level), {
    rich_text: formatInlineTokens(token.children ?? []),
  });
};

/**
 * Resolve a heading level from `token.level`, then `attrs.level`, else 1.
 * Levels outside 1-3 clamp to 3.
 */
export function resolveHeadingLevel(token: MarkdownToken): number {
  const level = token.level ? token.level : token.attrs?.level;
  if (level === undefined) return 1;
  if (level < 1 || level > 3) return 3;
  return level;
}

function headingBlockType(level: number): HeadingBlockType {
  if (level === 1) return 'heading_1';
  if (level === 2) return 'heading_2';
  return 'heading_3';
}

/**
 * Fenced or indented code. The body is kept verbatim as a single
 * unformatted run.
 */
export const convertCodeBlock: BlockConverter = (token) => {
  const language = resolveCodeLanguage(token.info || token.attrs?.info);
  return makeBlock('code', {
    rich_text: [makeRichText(token.raw ?? '')],
    language,
  });
};

/**
 * List. Every item of the list gets the same block type, chosen by
 * `attrs.ordered`.
 */
export const convertList: BlockConverter = (token, context) => {
  const blockType: ListItemBlockType = token.attrs?.ordered
    ? 'numbered_list_item'
    : 'bulleted_list_item';

  return (token.children ?? []).map((item) => convertListItem(item, context, blockType));
};

/**
 * List item. Text-like children (`block_text`, `paragraph`) are joined into
 * the item's rich text; any other child is converted through the walk and
 * nested under `children`.
 */
export function convertListItem(
  token: MarkdownToken,
  context: ConversionContext,
  blockType: ListItemBlockType = 'bulleted_list_item',
): NotionBlock<ListItemBlockType> {
  const richText: NotionRichText[] = [];
  const nested: NotionBlock[] = [];

  for (const child of token.children ?? []) {
    if (child.type === 'block_text' || child.type === 'paragraph') {
      richText.push(...formatInlineTokens(child.children ?? []));
    } else {
      nested.push(...context.convertBlocks([child]));
    }
  }

  const content: ListItemContent = nested.length > 0
    ? { rich_text: richText, children: nested }
    : { rich_text: richText };

  return makeBlock(blockType, content);
}

/**
 * Block quote. A leading paragraph is unwrapped one level before
 * formatting.
 */
export const convertQuote: BlockConverter = (token) => {
  let children = token.children ?? [];
  if (children.length > 0 && children[0].type === 'paragraph') {
    children = children[0].children ?? [];
  }
  return makeBlock('quote', { rich_text: formatInlineTokens(children) });
};

export const convertDivider: BlockConverter = () => makeBlock('divider', {});

export const convertTable: BlockConverter = (token) =>
  makeBlock('table', buildTableContent(token));

/** Image, linked externally by url. */
export const convertImage: BlockConverter = (token) =>
  makeBlock('image', {
    type: 'external',
    external: { url: token.attrs?.url ?? '' },
  });

/** Produces no block. Used for blank lines and untyped tokens. */
export const ignoreToken: BlockConverter = () => null;
