/**
 * Element renderers map one content item and a rectangle to drawing
 * instructions. They are pure: same item, rectangle and theme, same output.
 */

import { ChartElement, Rect, TableElement } from '../models/deck.model';
import { VisualItem } from '../models/topic.model';
import { Theme } from '../theme/theme';

import { assertChartShape, renderChart } from './chart-renderer';
import { assertTableShape, renderTable } from './table-renderer';

export * from './text-renderer';
export * from './table-renderer';
export * from './chart-renderer';

/**
 * Render a table or chart into its rectangle
 */
export function renderVisual(item: VisualItem, rect: Rect, theme: Theme): TableElement | ChartElement {
  return item.type === 'table' ? renderTable(item, rect, theme) : renderChart(item, rect, theme);
}

/**
 * Run the shape checks a table or chart must pass before it can be drawn
 */
export function validateVisual(item: VisualItem): void {
  if (item.type === 'table') {
    assertTableShape(item);
  } else {
    assertChartShape(item);
  }
}
