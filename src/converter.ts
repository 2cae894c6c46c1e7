import type { NotionizeOptions } from './types.js';
import type { MarkdownParser, MarkdownToken } from './core/types.js';
import { createMarkdownParser } from './core/parser.js';
import { InvalidMarkdownError } from './errors.js';
import { resolveLogger, type Logger } from './logger.js';
import type { ConverterFactory } from './notion/dispatcher.js';
import { serializeBlock } from './notion/serializer.js';
import type { NotionApiBlock, NotionBlock } from './notion/types.js';
import { convertBlocks } from './notion/walker.js';

/**
 * Converts Markdown into Notion API blocks.
 *
 * An instance keeps its options (override hook, parser, logger) and holds
 * no other state, so it can be reused for any number of documents.
 *
 * @example
 * ```ts
 * const notionizer = new Notionizer();
 * notionizer.run('# Hello');
 * // [{ object: 'block', type: 'heading_1', heading_1: { rich_text: [...] } }]
 * ```
 */
export class Notionizer {
  private readonly converterFactory?: ConverterFactory;
  private readonly parser: MarkdownParser;
  private readonly logger: Logger;

  constructor(options: NotionizeOptions = {}) {
    this.converterFactory = options.converterFactory;
    this.parser = options.parser ?? createMarkdownParser(options.parserOptions);
    this.logger = resolveLogger(options);
  }

  /**
   * Convert Markdown content into wire-format Notion blocks.
   *
   * Pipeline:
   * 1. Parse Markdown into a token tree
   * 2. Walk the tree into block records
   * 3. Serialize each block to the API shape
   *
   * @throws {InvalidMarkdownError} When the parser returns a string.
   * @throws {UnknownTokenError} When a token type has no converter.
   * @throws {ConversionError} When a converter fails.
   */
  run(content: string): NotionApiBlock[] {
    const tokens = this.parser(content);
    if (typeof tokens === 'string') {
      throw new InvalidMarkdownError(
        'Failed to parse markdown: expected list of tokens but got string',
      );
    }

    this.logger.debug(`parsed ${tokens.length} top-level tokens`);
    return this.convertBlocks(tokens).map(serializeBlock);
  }

  /**
   * Convert a token tree into block records without serializing them.
   */
  convertBlocks(tokens: readonly MarkdownToken[]): NotionBlock[] {
    return convertBlocks(tokens, {
      converterFactory: this.converterFactory,
      logger: this.logger,
    });
  }
}

/**
 * Convert Markdown content into Notion API blocks.
 *
 * @param content - Markdown source.
 * @param options - Override hook, parser and logging options.
 * @returns Blocks ready to send to the Notion API.
 *
 * @example
 * ```ts
 * notionize('---');
 * // [{ object: 'block', type: 'divider', divider: {} }]
 * ```
 */
export function notionize(content: string, options?: NotionizeOptions): NotionApiBlock[] {
  return new Notionizer(options).run(content);
}
