/**
 * Markdown parser module.
 *
 * Tokenizes Markdown source with the `marked` lexer and rewrites the result
 * into the {@link MarkdownToken} tree consumed by the block converters.
 *
 * Token mapping (marked -> tree):
 *   heading -> heading, code -> block_code, blockquote -> block_quote,
 *   hr -> thematic_break, space -> blank_line, em -> emphasis,
 *   del -> strikethrough, br -> linebreak, list item text -> block_text.
 *
 * @module core/parser
 */
import { Lexer } from 'marked';
import type { Token, Tokens } from 'marked';
import type { MarkdownParser, MarkdownToken, ParserOptions } from './types.js';

/** Marked token types that carry no content for the block tree. */
const DROPPED_TOKEN_TYPES = new Set(['def', 'checkbox']);

/**
 * Convert a list of `marked` tokens into tree tokens, dropping the ones with
 * no counterpart.
 */
export function toMarkdownTokens(tokens: readonly Token[]): MarkdownToken[] {
  const result: MarkdownToken[] = [];
  for (const token of tokens) {
    const converted = toMarkdownToken(token);
    if (converted) {
      result.push(converted);
    }
  }
  return result;
}

/**
 * Convert a single `marked` token.
 *
 * @returns The tree token, or `null` when the token is dropped.
 */
export function toMarkdownToken(token: Token): MarkdownToken | null {
  if (DROPPED_TOKEN_TYPES.has(token.type)) {
    return null;
  }

  switch (token.type) {
    case 'heading': {
      const t = token as Tokens.Heading;
      return {
        type: 'heading',
        attrs: { level: t.depth },
        children: toMarkdownTokens(t.tokens),
      };
    }

    case 'paragraph': {
      const t = token as Tokens.Paragraph;
      return { type: 'paragraph', children: toMarkdownTokens(t.tokens) };
    }

    case 'code': {
      const t = token as Tokens.Code;
      // marked strips the newline before the closing fence; the tree keeps it.
      const raw = t.text ? `${t.text}\n` : '';
      return t.lang
        ? { type: 'block_code', raw, attrs: { info: t.lang } }
        : { type: 'block_code', raw };
    }

    case 'blockquote': {
      const t = token as Tokens.Blockquote;
      return { type: 'block_quote', children: toMarkdownTokens(t.tokens) };
    }

    case 'hr':
      return { type: 'thematic_break' };

    case 'space':
      return { type: 'blank_line' };

    case 'list': {
      const t = token as Tokens.List;
      const attrs = typeof t.start === 'number'
        ? { ordered: t.ordered, start: t.start }
        : { ordered: t.ordered };
      return {
        type: 'list',
        attrs,
        children: t.items.map(toListItem),
      };
    }

    case 'table':
      return toTable(token as Tokens.Table);

    case 'html': {
      const t = token as Tokens.HTML;
      return { type: t.block ? 'block_html' : 'inline_html', raw: t.text };
    }

    case 'text': {
      const t = token as Tokens.Text;
      // Block-level text (list item content) carries its own inline tokens.
      if (Array.isArray(t.tokens)) {
        return { type: 'block_text', children: toMarkdownTokens(t.tokens) };
      }
      return { type: 'text', raw: t.text };
    }

    case 'escape': {
      const t = token as Tokens.Escape;
      return { type: 'text', raw: t.text };
    }

    case 'strong': {
      const t = token as Tokens.Strong;
      return { type: 'strong', children: toMarkdownTokens(t.tokens) };
    }

    case 'em': {
      const t = token as Tokens.Em;
      return { type: 'emphasis', children: toMarkdownTokens(t.tokens) };
    }

    case 'del': {
      const t = token as Tokens.Del;
      return { type: 'strikethrough', children: toMarkdownTokens(t.tokens) };
    }

    case 'codespan': {
      const t = token as Tokens.Codespan;
      return { type: 'codespan', raw: t.text };
    }

    case 'br':
      return { type: 'linebreak' };

    case 'link': {
      const t = token as Tokens.Link;
      return {
        type: 'link',
        attrs: t.title ? { url: t.href, title: t.title } : { url: t.href },
        children: toMarkdownTokens(t.tokens),
      };
    }

    case 'image': {
      const t = token as Tokens.Image;
      return {
        type: 'image',
        attrs: t.title ? { url: t.href, title: t.title } : { url: t.href },
        children: t.text ? [{ type: 'text', raw: t.text }] : [],
      };
    }

    default:
      // Unmapped types keep their name so an override hook can claim them.
      return { type: token.type, raw: token.raw };
  }
}

function toListItem(item: Tokens.ListItem): MarkdownToken {
  return { type: 'list_item', children: toMarkdownTokens(item.tokens) };
}

function toTableCell(cell: Tokens.TableCell): MarkdownToken {
  return { type: 'table_cell', children: toMarkdownTokens(cell.tokens) };
}

/**
 * Rebuild a marked table as `table_head` (cells) plus `table_body`
 * (`table_row` -> cells).
 */
function toTable(token: Tokens.Table): MarkdownToken {
  return {
    type: 'table',
    children: [
      { type: 'table_head', children: token.header.map(toTableCell) },
      {
        type: 'table_body',
        children: token.rows.map((row) => ({
          type: 'table_row',
          children: row.map(toTableCell),
        })),
      },
    ],
  };
}

/**
 * Parse a Markdown string into a token tree.
 *
 * GFM is enabled by default so that tables are recognised.
 *
 * @param markdown - The Markdown source. Empty or whitespace-only input
 *   produces an empty token list.
 * @param options - Optional parser configuration.
 *
 * @example
 * ```ts
 * parseMarkdown('# Hello')[0];
 * // { type: 'heading', attrs: { level: 1 }, children: [{ type: 'text', raw: 'Hello' }] }
 * ```
 */
export function parseMarkdown(
  markdown: string,
  options?: ParserOptions,
): MarkdownToken[] {
  const source: string = typeof markdown === 'string' ? markdown : '';

  if (source.trim().length === 0) {
    return [];
  }

  const gfm = options?.gfm ?? true;
  const breaks = options?.breaks ?? false;

  return toMarkdownTokens(Lexer.lex(source, { gfm, breaks }));
}

/**
 * Bind parser options into a {@link MarkdownParser}.
 */
export function createMarkdownParser(options?: ParserOptions): MarkdownParser {
  return (markdown) => parseMarkdown(markdown, options);
}
