/**
 * Wire serialization of converted blocks.
 *
 * @module serializer
 */

import type { NotionApiBlock, NotionBlock } from './types.js';

/**
 * Serialize a block to the Notion API shape, where the content sits under a
 * key named after the block type. Unset (`undefined` or `null`) fields are
 * omitted; nested blocks are serialized the same way.
 *
 * @example
 * ```ts
 * serializeBlock(makeBlock('divider', {}));
 * // { object: 'block', type: 'divider', divider: {} }
 * ```
 */
export function serializeBlock(block: NotionBlock): NotionApiBlock {
  return {
    object: block.object,
    type: block.type,
    [block.type]: serializeValue(block.content),
  };
}

function serializeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(serializeValue);
  }
  if (isNotionBlock(value)) {
    return serializeBlock(value);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      if (field === undefined || field === null) continue;
      result[key] = serializeValue(field);
    }
    return result;
  }
  return value;
}

function isNotionBlock(value: unknown): value is NotionBlock {
  return (
    typeof value === 'object' &&
    value !== null &&
    'object' in value &&
    value.object === 'block' &&
    'content' in value &&
    'type' in value
  );
}
