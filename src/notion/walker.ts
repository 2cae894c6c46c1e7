/**
 * Token tree walker.
 *
 * Converts a token list into a flat block list. List items call back into
 * the walk through their {@link ConversionContext}, so nested lists reuse
 * the same override hook and logger.
 *
 * @module walker
 */

import type { MarkdownToken } from '../core/types.js';
import { ConversionError } from '../errors.js';
import { resolveLogger, type Logger } from '../logger.js';
import type { ConversionContext, ConverterOutput } from './block-converter.js';
import { selectConverter, type ConverterFactory } from './dispatcher.js';
import type { NotionBlock } from './types.js';

export interface WalkOptions {
  /** Override hook consulted before the built-in converters. */
  converterFactory?: ConverterFactory;
  /** Diagnostics sink. Defaults to silent. */
  logger?: Logger;
  /** Log through `console.debug` when no logger is given. @default false */
  debug?: boolean;
}

/**
 * Convert a list of tokens into Notion blocks.
 *
 * Tokens without a type and tokens whose converter returns `null` are
 * skipped; converters returning several blocks are flattened in order.
 * The first failure aborts the walk.
 *
 * @throws {UnknownTokenError} When a token type has no converter.
 * @throws {ConversionError} When a converter throws. The original error is
 *   kept as `cause`.
 */
export function convertBlocks(
  tokens: readonly MarkdownToken[],
  options: WalkOptions = {},
): NotionBlock[] {
  const logger = resolveLogger(options);
  const walkOptions: WalkOptions = { converterFactory: options.converterFactory, logger };
  const context: ConversionContext = {
    convertBlocks: (nested) => convertBlocks(nested, walkOptions),
  };

  const blocks: NotionBlock[] = [];

  for (const token of tokens) {
    const tokenType = token.type;

    if (!tokenType) {
      logger.debug('skipping token without a type');
      continue;
    }

    const converter = selectConverter(token, options.converterFactory);

    let output: ConverterOutput;
    try {
      output = converter(token, context);
    } catch (err) {
      logger.debug(`conversion failed for '${tokenType}' token`, err);
      throw new ConversionError(tokenType, err);
    }

    if (!output) {
      logger.debug(`'${tokenType}' token produced no block`);
      continue;
    }

    if (Array.isArray(output)) {
      blocks.push(...output);
    } else {
      blocks.push(output);
    }
  }

  return blocks;
}
