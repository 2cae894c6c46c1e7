/**
 * md2notion - Markdown to Notion block converter
 */

// High-level conversion API
export { notionize, Notionizer } from './converter.js';

// Types
export type { NotionizeOptions } from './types.js';

// Errors
export {
  NotionizeError,
  InvalidMarkdownError,
  UnknownTokenError,
  ConversionError,
} from './errors.js';

// Logging
export { consoleLogger, silentLogger, LOG_PREFIX } from './logger.js';
export type { Logger } from './logger.js';

// Core module re-exports
export { parseMarkdown, createMarkdownParser } from './core/index.js';
export type { MarkdownToken, TokenAttrs, MarkdownParser, ParserOptions } from './core/index.js';

// Notion module re-exports
export {
  convertBlocks,
  selectConverter,
  BUILT_IN_CONVERTERS,
  formatInlineTokens,
  makeRichText,
  DEFAULT_ANNOTATIONS,
  makeBlock,
  convertParagraph,
  convertHeading,
  convertCodeBlock,
  convertList,
  convertListItem,
  convertQuote,
  convertDivider,
  convertTable,
  convertImage,
  ignoreToken,
  serializeBlock,
  NOTION_BLOCK_TYPES,
  NOTION_LANGUAGES,
  PLAIN_TEXT,
  resolveCodeLanguage,
} from './notion/index.js';

export type {
  BlockConverter,
  ConversionContext,
  ConverterFactory,
  ConverterOutput,
  WalkOptions,
  NotionApiBlock,
  NotionBlock,
  NotionBlockType,
  NotionRichText,
  NotionAnnotations,
  NotionColor,
  TextStyle,
} from './notion/index.js';
