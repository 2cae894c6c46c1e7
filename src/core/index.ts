/**
 * Core module barrel exports.
 *
 * @module core
 */

// Parser
export { parseMarkdown, createMarkdownParser, toMarkdownToken, toMarkdownTokens } from './parser.js';

// Types
export type {
  MarkdownToken,
  TokenAttrs,
  MarkdownParser,
  ParserOptions,
} from './types.js';
