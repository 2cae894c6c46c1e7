/**
 * Inline token formatter for Notion rich text.
 *
 * Shared by `block-converter.ts` and `table-builder.ts`:
 *   block-converter.ts  -->  inline-formatter.ts  <--  table-builder.ts
 *
 * Only `text`, `strong`, `emphasis` and `link` produce runs. Styled tokens
 * contribute their direct `text` children only, so `***both***` keeps just
 * the outer annotation and deeper nesting is dropped.
 *
 * @module inline-formatter
 */

import type { MarkdownToken } from '../core/types.js';
import type { NotionAnnotations, NotionRichText, TextStyle } from './types.js';

/** Annotations of an unformatted run. */
export const DEFAULT_ANNOTATIONS: NotionAnnotations = Object.freeze<NotionAnnotations>({
  bold: false,
  italic: false,
  strikethrough: false,
  underline: false,
  code: false,
  color: 'default',
});

// ---------------------------------------------------------------------------
// Inline token formatting
// ---------------------------------------------------------------------------

/**
 * Convert a flat sequence of inline tokens into rich text runs.
 *
 * Unsupported inline types (code spans, line breaks, inline HTML, ...) are
 * skipped without producing a run.
 *
 * @param tokens - Inline tokens of a paragraph, heading, cell, etc.
 * @returns Runs in source order.
 */
export function formatInlineTokens(tokens: readonly MarkdownToken[]): NotionRichText[] {
  const runs: NotionRichText[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'text':
        runs.push(makeRichText(literalText(token)));
        break;

      case 'strong':
        runs.push(...formatStyledChildren(token, { bold: true }));
        break;

      case 'emphasis':
        runs.push(...formatStyledChildren(token, { italic: true }));
        break;

      case 'link':
        runs.push(formatLink(token));
        break;

      default:
        break;
    }
  }

  return runs;
}

function formatStyledChildren(token: MarkdownToken, style: TextStyle): NotionRichText[] {
  const runs: NotionRichText[] = [];
  for (const child of token.children ?? []) {
    if (child.type === 'text') {
      runs.push(makeRichText(literalText(child), style));
    }
  }
  return runs;
}

/**
 * A link becomes exactly one run: the first child's text, linked to the
 * token's url. An empty url leaves the run unlinked.
 */
function formatLink(token: MarkdownToken): NotionRichText {
  const first = token.children?.[0];
  const content = first ? literalText(first) : '';
  const url = token.attrs?.url ?? '';
  return makeRichText(content, url ? { link: { url } } : {});
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Literal text of a token: `raw`, falling back to `text`.
 */
export function literalText(token: MarkdownToken): string {
  return token.raw ?? token.text ?? '';
}

/**
 * Create a frozen rich text run. Annotations not named in `style` keep their
 * defaults.
 */
export function makeRichText(content: string, style: TextStyle = {}): NotionRichText {
  const { link, ...overrides } = style;
  const annotations: NotionAnnotations = { ...DEFAULT_ANNOTATIONS, ...overrides };
  const run: NotionRichText = {
    type: 'text',
    text: link ? { content, link: { url: link.url } } : { content },
    annotations: Object.freeze(annotations),
  };
  return Object.freeze(run);
}
