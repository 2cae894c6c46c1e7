import { createMarkdownParser, parseMarkdown, toMarkdownToken } from '../../src/core/parser.js';
import type { MarkdownToken } from '../../src/core/types.js';
import type { Token } from 'marked';

/** Top-level tokens without blank lines. */
function content(markdown: string): MarkdownToken[] {
  return parseMarkdown(markdown).filter((token) => token.type !== 'blank_line');
}

describe('parseMarkdown', () => {
  // -----------------------------------------------------------------------
  // Empty / whitespace-only input
  // -----------------------------------------------------------------------

  describe('empty input', () => {
    it('returns an empty token list for an empty string', () => {
      expect(parseMarkdown('')).toEqual([]);
    });

    it('returns an empty token list for whitespace-only input', () => {
      expect(parseMarkdown('   \n\n  \t  ')).toEqual([]);
    });
  });

  // -----------------------------------------------------------------------
  // Block tokens
  // -----------------------------------------------------------------------

  describe('block tokens', () => {
    it('maps headings with their level', () => {
      expect(content('# Hello')).toEqual([
        { type: 'heading', attrs: { level: 1 }, children: [{ type: 'text', raw: 'Hello' }] },
      ]);
      expect(content('### Deep')[0].attrs).toEqual({ level: 3 });
    });

    it('maps paragraphs', () => {
      expect(content('Just text')).toEqual([
        { type: 'paragraph', children: [{ type: 'text', raw: 'Just text' }] },
      ]);
    });

    it('maps fenced code with the trailing newline and info', () => {
      expect(content('```js\nconsole.log(1)\n```')).toEqual([
        { type: 'block_code', raw: 'console.log(1)\n', attrs: { info: 'js' } },
      ]);
    });

    it('omits info for a fence without a language', () => {
      expect(content('```\nplain\n```')).toEqual([{ type: 'block_code', raw: 'plain\n' }]);
    });

    it('maps blockquotes to block_quote wrapping a paragraph', () => {
      expect(content('> quoted')).toEqual([
        {
          type: 'block_quote',
          children: [{ type: 'paragraph', children: [{ type: 'text', raw: 'quoted' }] }],
        },
      ]);
    });

    it('maps horizontal rules to thematic_break', () => {
      expect(content('a\n\n---\n\nb').map((token) => token.type)).toEqual([
        'paragraph',
        'thematic_break',
        'paragraph',
      ]);
    });

    it('maps an unordered list with block_text items', () => {
      const [list] = content('- a\n- b');
      expect(list.type).toBe('list');
      expect(list.attrs).toEqual({ ordered: false });
      expect(list.children?.map((item) => item.type)).toEqual(['list_item', 'list_item']);
      expect(list.children?.[0].children?.[0]).toEqual({
        type: 'block_text',
        children: [{ type: 'text', raw: 'a' }],
      });
    });

    it('records ordered lists and their start number', () => {
      const [list] = content('3. three\n4. four');
      expect(list.attrs).toEqual({ ordered: true, start: 3 });
    });

    it('keeps nested lists inside list items', () => {
      const [list] = content('- parent\n  - child');
      const item = list.children?.[0];
      const nested = item?.children?.find((child) => child.type === 'list');
      expect(nested?.children?.[0].children?.[0]).toEqual({
        type: 'block_text',
        children: [{ type: 'text', raw: 'child' }],
      });
    });

    it('rebuilds tables as head and body', () => {
      expect(content('| a | b |\n| --- | --- |\n| 1 | 2 |')).toEqual([
        {
          type: 'table',
          children: [
            {
              type: 'table_head',
              children: [
                { type: 'table_cell', children: [{ type: 'text', raw: 'a' }] },
                { type: 'table_cell', children: [{ type: 'text', raw: 'b' }] },
              ],
            },
            {
              type: 'table_body',
              children: [
                {
                  type: 'table_row',
                  children: [
                    { type: 'table_cell', children: [{ type: 'text', raw: '1' }] },
                    { type: 'table_cell', children: [{ type: 'text', raw: '2' }] },
                  ],
                },
              ],
            },
          ],
        },
      ]);
    });

    it('does not recognise tables when gfm is disabled', () => {
      const tokens = parseMarkdown('| a | b |\n| --- | --- |\n| 1 | 2 |', { gfm: false });
      expect(tokens.some((token) => token.type === 'table')).toBe(false);
    });

    it('maps html blocks to block_html', () => {
      expect(content('<div>hi</div>')[0].type).toBe('block_html');
    });

    it('drops link reference definitions', () => {
      expect(content('[ref]: https://example.com\n\nText').map((token) => token.type)).toEqual([
        'paragraph',
      ]);
    });
  });

  // -----------------------------------------------------------------------
  // Inline tokens
  // -----------------------------------------------------------------------

  describe('inline tokens', () => {
    it('maps inline formatting types', () => {
      const [para] = content(
        'a **b** *c* ~~d~~ `e` [f](https://example.com)',
      );
      expect(para.children?.map((token) => token.type)).toEqual([
        'text',
        'strong',
        'text',
        'emphasis',
        'text',
        'strikethrough',
        'text',
        'codespan',
        'text',
        'link',
      ]);
    });

    it('maps links with their url and children', () => {
      const [para] = content('[site](https://example.com)');
      expect(para.children).toEqual([
        {
          type: 'link',
          attrs: { url: 'https://example.com' },
          children: [{ type: 'text', raw: 'site' }],
        },
      ]);
    });

    it('maps images with url, title and alt text', () => {
      const [para] = content('![Logo](https://example.com/logo.png "Brand")');
      expect(para.children).toEqual([
        {
          type: 'image',
          attrs: { url: 'https://example.com/logo.png', title: 'Brand' },
          children: [{ type: 'text', raw: 'Logo' }],
        },
      ]);
    });

    it('maps code spans to codespan with their text', () => {
      const [para] = content('`x`');
      expect(para.children).toEqual([{ type: 'codespan', raw: 'x' }]);
    });
  });
});

describe('toMarkdownToken', () => {
  it('passes unmapped types through under their own name', () => {
    const token: Token = { type: 'footnote', raw: '[^1]' };
    expect(toMarkdownToken(token)).toEqual({ type: 'footnote', raw: '[^1]' });
  });

  it('drops checkbox tokens', () => {
    const token: Token = { type: 'checkbox', raw: '[ ] ' };
    expect(toMarkdownToken(token)).toBeNull();
  });

  it('maps space tokens to blank_line', () => {
    const token: Token = { type: 'space', raw: '\n\n' };
    expect(toMarkdownToken(token)).toEqual({ type: 'blank_line' });
  });
});

describe('createMarkdownParser', () => {
  it('binds parser options', () => {
    const parse = createMarkdownParser({ gfm: false });
    const result = parse('| a |\n| --- |\n| 1 |');
    expect(Array.isArray(result) && result.some((token) => token.type === 'table')).toBe(false);
  });
});
