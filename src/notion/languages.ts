/**
 * Code block languages accepted by Notion.
 *
 * The list is a closed set; a fence language outside it is stored as
 * `plain text`. Matching is exact and case-sensitive.
 *
 * @module languages
 */

import languages from './languages.json';

export const PLAIN_TEXT = 'plain text';

export const NOTION_LANGUAGES: ReadonlySet<string> = new Set<string>(languages);

export function isNotionLanguage(lang: string): boolean {
  return NOTION_LANGUAGES.has(lang);
}

/**
 * Map a fence language to the Notion code-block language.
 *
 * @param lang - Language hint from the code fence.
 * @returns `lang` itself when Notion supports it, otherwise `plain text`.
 */
export function resolveCodeLanguage(lang: string | undefined): string {
  if (!lang) return PLAIN_TEXT;
  return isNotionLanguage(lang) ? lang : PLAIN_TEXT;
}
