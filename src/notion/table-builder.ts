/**
 * Table structure builder for Notion table blocks.
 *
 * A Markdown table token has a two-layer shape:
 *   table -> table_head (cells) + table_body (table_row -> cells)
 *
 * Notion wants a single table block whose `children` are `table_row`
 * records, header row first.
 *
 * @module table-builder
 */

import type { MarkdownToken } from '../core/types.js';
import type { NotionRichText, NotionTableRow, TableContent } from './types.js';
import { formatInlineTokens, literalText, makeRichText } from './inline-formatter.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Header cells and body rows located in a table token. */
export interface TableStructure {
  /** Cell tokens of the header row. Empty when the table has no head. */
  headerCells: readonly MarkdownToken[];
  /** Row tokens of the body, each holding cell tokens as children. */
  bodyRows: readonly MarkdownToken[];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build the content of a Notion table block from a table token.
 */
export function buildTableContent(token: MarkdownToken): TableContent {
  const structure = extractTableStructure(token);
  return {
    table_width: calculateTableWidth(structure),
    has_column_header: structure.headerCells.length > 0,
    // Row headers are never detected.
    has_row_header: false,
    children: buildTableRows(structure),
  };
}

/**
 * Locate the `table_head` and `table_body` children of a table token.
 */
export function extractTableStructure(token: MarkdownToken): TableStructure {
  const children = token.children ?? [];
  const head = children.find((child) => child.type === 'table_head');
  const body = children.find((child) => child.type === 'table_body');

  return {
    headerCells: head?.children ?? [],
    bodyRows: body?.children ?? [],
  };
}

/**
 * Number of columns: header cell count, else the first body row's cell
 * count, else 1.
 */
export function calculateTableWidth(structure: TableStructure): number {
  if (structure.headerCells.length > 0) {
    return structure.headerCells.length;
  }
  const firstRowWidth = structure.bodyRows[0]?.children?.length ?? 0;
  return firstRowWidth > 0 ? firstRowWidth : 1;
}

/**
 * Convert the header row (when present) and then each body row in order.
 */
export function buildTableRows(structure: TableStructure): NotionTableRow[] {
  const rows: NotionTableRow[] = [];

  if (structure.headerCells.length > 0) {
    rows.push(makeTableRow(structure.headerCells));
  }

  for (const row of structure.bodyRows) {
    rows.push(makeTableRow(row.children ?? []));
  }

  return rows;
}

/**
 * Convert one cell to rich text.
 *
 * A cell whose sole content is a link bypasses the inline formatter: the
 * run takes the link's first child text and always carries the link, even
 * when the url is empty.
 */
export function convertTableCell(cell: MarkdownToken): NotionRichText[] {
  const content = cell.children ?? [];
  const [first] = content;

  if (content.length === 1 && first.type === 'link') {
    const label = first.children?.[0];
    return [
      makeRichText(label ? literalText(label) : '', {
        link: { url: first.attrs?.url ?? '' },
      }),
    ];
  }

  return formatInlineTokens(content);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTableRow(cells: readonly MarkdownToken[]): NotionTableRow {
  return {
    type: 'table_row',
    table_row: { cells: cells.map(convertTableCell) },
  };
}
