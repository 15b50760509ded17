/**
 * Table renderer
 *
 * Header row: bold white text on the primary color.
 * Data rows are numbered from 1; even-numbered rows get the light
 * background. Every cell is centered.
 */

import { ShapeMismatchError } from '../errors';
import { Rect, TableCell, TableElement } from '../models/deck.model';
import { TableItem } from '../models/topic.model';
import { Theme } from '../theme/theme';

/**
 * Every row must have one cell per header, and there must be headers
 */
export function assertTableShape(item: TableItem): void {
  const columns = item.headers.length;
  if (columns === 0) {
    throw new ShapeMismatchError('Table has no headers', item.type);
  }

  item.rows.forEach((row, index) => {
    if (row.length !== columns) {
      throw new ShapeMismatchError(
        `Table row ${index + 1} has ${row.length} cells, expected ${columns}`,
        item.type
      );
    }
  });
}

export function renderTable(item: TableItem, rect: Rect, theme: Theme): TableElement {
  assertTableShape(item);

  const header = item.headers.map((text): TableCell => ({
    text: String(text),
    fontSize: theme.fonts.tableHeader,
    align: 'center',
    bold: true,
    color: theme.palette.white,
    fill: theme.palette.primary,
  }));

  const body = item.rows.map((row, index) => {
    const rowNumber = index + 1;
    const shaded = rowNumber % 2 === 0;
    return row.map(
      (value): TableCell => ({
        text: String(value),
        fontSize: theme.fonts.tableBody,
        align: 'center',
        ...(shaded ? { fill: theme.palette.lightBackground } : {}),
      })
    );
  });

  return { kind: 'table', rect, rows: [header, ...body] };
}
