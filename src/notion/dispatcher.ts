/**
 * Converter selection.
 *
 * An override hook, when given, is asked first; otherwise the built-in
 * type table decides.
 *
 * @module dispatcher
 */

import type { MarkdownToken } from '../core/types.js';
import { UnknownTokenError } from '../errors.js';
import {
  convertCodeBlock,
  convertDivider,
  convertHeading,
  convertImage,
  convertList,
  convertListItem,
  convertParagraph,
  convertQuote,
  convertTable,
  ignoreToken,
  type BlockConverter,
} from './block-converter.js';

/**
 * Override hook. Return a converter to take over a token, or `null` /
 * `undefined` to fall through to the built-in table.
 */
export type ConverterFactory = (token: MarkdownToken) => BlockConverter | null | undefined;

export const BLANK_LINE = 'blank_line';

/** Built-in token type to converter table. */
export const BUILT_IN_CONVERTERS: ReadonlyMap<string, BlockConverter> = new Map<string, BlockConverter>([
  [BLANK_LINE, ignoreToken],
  ['paragraph', convertParagraph],
  ['block_text', convertParagraph],
  ['heading', convertHeading],
  ['block_code', convertCodeBlock],
  ['block_quote', convertQuote],
  ['thematic_break', convertDivider],
  ['list', convertList],
  ['list_item', (token, context) => convertListItem(token, context)],
  ['table', convertTable],
  ['image', convertImage],
]);

/**
 * Select the converter for a token.
 *
 * @param token - Token to convert.
 * @param converterFactory - Optional override hook, consulted first.
 * @throws {UnknownTokenError} When neither the hook nor the built-in table
 *   knows the token type.
 */
export function selectConverter(
  token: MarkdownToken,
  converterFactory?: ConverterFactory,
): BlockConverter {
  if (converterFactory) {
    const custom = converterFactory(token);
    if (custom) {
      return custom;
    }
  }

  const tokenType = token.type;
  if (!tokenType) {
    return ignoreToken;
  }

  const converter = BUILT_IN_CONVERTERS.get(tokenType);
  if (!converter) {
    throw new UnknownTokenError(tokenType);
  }
  return converter;
}
