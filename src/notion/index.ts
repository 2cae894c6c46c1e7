/**
 * Notion module barrel exports.
 *
 * @module notion
 */

// Walker and dispatcher
export { convertBlocks } from './walker.js';
export type { WalkOptions } from './walker.js';
export { selectConverter, BUILT_IN_CONVERTERS, BLANK_LINE } from './dispatcher.js';
export type { ConverterFactory } from './dispatcher.js';

// Converters
export {
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
  resolveHeadingLevel,
} from './block-converter.js';
export type { BlockConverter, ConversionContext, ConverterOutput } from './block-converter.js';

// Inline formatting
export { formatInlineTokens, makeRichText, DEFAULT_ANNOTATIONS } from './inline-formatter.js';

// Tables
export { buildTableContent, extractTableStructure, calculateTableWidth } from './table-builder.js';

// Languages
export { NOTION_LANGUAGES, PLAIN_TEXT, resolveCodeLanguage, isNotionLanguage } from './languages.js';

// Serialization
export { serializeBlock } from './serializer.js';

// Types
export { NOTION_BLOCK_TYPES } from './types.js';
export type {
  NotionApiBlock,
  NotionBlock,
  NotionBlockType,
  NotionRichText,
  NotionAnnotations,
  NotionColor,
  TextStyle,
} from './types.js';
