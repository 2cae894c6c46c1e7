/**
 * Shared fixtures for the test suites.
 */
import type { MarkdownToken } from '../src/core/types.js';
import type { NotionAnnotations, NotionRichText } from '../src/notion/types.js';

/** Expected rich text run with default annotations plus `overrides`. */
export function richText(
  content: string,
  overrides: Partial<NotionAnnotations> = {},
  url?: string,
): NotionRichText {
  return {
    type: 'text',
    text: url === undefined ? { content } : { content, link: { url } },
    annotations: {
      bold: false,
      italic: false,
      strikethrough: false,
      underline: false,
      code: false,
      color: 'default',
      ...overrides,
    },
  };
}

export function text(raw: string): MarkdownToken {
  return { type: 'text', raw };
}

export function paragraph(...children: MarkdownToken[]): MarkdownToken {
  return { type: 'paragraph', children };
}
