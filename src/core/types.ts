/**
 * Core type definitions for the Markdown parser boundary.
 *
 * The converter never sees `marked` tokens directly. The parser adapter
 * rewrites them into the {@link MarkdownToken} tree below, which is the
 * only input shape the Notion block converters understand.
 */

/**
 * Type-specific fields a token may carry under `attrs`.
 */
export interface TokenAttrs {
  /** Heading level (1-6 in source Markdown). */
  readonly level?: number;
  /** Whether a list is ordered. @default false */
  readonly ordered?: boolean;
  /** Start number of an ordered list. */
  readonly start?: number;
  /** Link or image target. */
  readonly url?: string;
  /** Link or image title. */
  readonly title?: string;
  /** Code fence info string (language hint). */
  readonly info?: string;
}

/**
 * A node of the parsed document tree.
 *
 * Block tokens: `paragraph`, `heading`, `block_code`, `block_quote`,
 * `thematic_break`, `list`, `list_item`, `block_text`, `table`,
 * `table_head`, `table_body`, `table_row`, `table_cell`, `blank_line`.
 *
 * Inline tokens: `text`, `strong`, `emphasis`, `strikethrough`, `codespan`,
 * `link`, `image`, `linebreak`.
 *
 * Any other `type` may appear; the dispatcher rejects it unless an override
 * hook claims it.
 */
export interface MarkdownToken {
  /** Token discriminator. Tokens without a type are skipped. */
  readonly type?: string;
  readonly children?: readonly MarkdownToken[];
  readonly attrs?: TokenAttrs;
  /** Literal payload (text content, code body). */
  readonly raw?: string;
  /** Alternate literal payload some producers use instead of `raw`. */
  readonly text?: string;
  /** Code fence info string, checked before `attrs.info`. */
  readonly info?: string;
  /** Heading level, checked before `attrs.level`. */
  readonly level?: number;
}

/**
 * Options that control how Markdown source is parsed.
 */
export interface ParserOptions {
  /**
   * Enable GitHub Flavored Markdown extensions (tables, strikethrough, etc.).
   * @default true
   */
  gfm?: boolean;

  /**
   * Enable GFM line breaks. Requires `gfm` to be `true`.
   * @default false
   */
  breaks?: boolean;
}

/**
 * A Markdown parser. Returning a string instead of a token list signals
 * that the source could not be turned into a token tree.
 */
export type MarkdownParser = (markdown: string) => MarkdownToken[] | string;
