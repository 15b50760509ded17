/**
 * Visual placement
 *
 * A lone table or chart gets the fixed rectangle of its kind. Several
 * visuals on one slide share the body region as equal-width columns, in
 * content order, so none is drawn over another.
 */

import { Rect } from '../models/deck.model';
import { VisualItem } from '../models/topic.model';
import { Theme } from '../theme/theme';

/**
 * Fixed rectangle for a visual drawn alone on its slide
 */
export function fixedRectFor(item: VisualItem, theme: Theme): Rect {
  switch (item.type) {
    case 'table':
      return theme.geometry.table;
    case 'pie-chart':
      return theme.geometry.pieChart;
    case 'bar-chart':
    case 'line-chart':
      return theme.geometry.chart;
  }
}

/**
 * Split a region into `count` columns separated by `gap`
 */
export function tileColumns(region: Rect, count: number, gap: number): Rect[] {
  if (count <= 0) {
    return [];
  }
  const width = (region.w - gap * (count - 1)) / count;
  return Array.from({ length: count }, (_, index) => ({
    x: region.x + index * (width + gap),
    y: region.y,
    w: width,
    h: region.h,
  }));
}

/**
 * One rectangle per visual, in the same order
 */
export function placeVisuals(visuals: readonly VisualItem[], theme: Theme): Rect[] {
  if (visuals.length === 1) {
    return [fixedRectFor(visuals[0], theme)];
  }
  return tileColumns(theme.geometry.body, visuals.length, theme.geometry.tileGap);
}
