import type { MarkdownParser, ParserOptions } from './core/types.js';
import type { Logger } from './logger.js';
import type { ConverterFactory } from './notion/dispatcher.js';

/**
 * Options for Markdown to Notion conversion
 */
export interface NotionizeOptions {
  /**
   * Override hook consulted for every token before the built-in converters.
   * Return a converter to take over the token, or `null` to fall through.
   */
  converterFactory?: ConverterFactory;
  /**
   * Replacement Markdown parser. Defaults to the `marked` lexer adapted by
   * `parseMarkdown`.
   */
  parser?: MarkdownParser;
  /** Options for the default parser. Ignored when `parser` is given. */
  parserOptions?: ParserOptions;
  /** Diagnostics sink. Defaults to silent. */
  logger?: Logger;
  /** Log through `console.debug` when no logger is given. @default false */
  debug?: boolean;
}
