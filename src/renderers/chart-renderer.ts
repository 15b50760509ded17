/**
 * Chart renderers
 *
 * Each chart carries one series. Styling per chart type:
 * - bar: clustered columns, solid primary fill, legend at the bottom
 * - line: secondary-color stroke, legend at the bottom
 * - pie: default palette, legend on the right
 */

import { ShapeMismatchError } from '../errors';
import { ChartElement, Rect } from '../models/deck.model';
import {
  BarChartItem,
  ChartItem,
  LineChartItem,
  PIE_SERIES_NAME,
  PieChartItem,
} from '../models/topic.model';
import { Theme } from '../theme/theme';

/** Stroke width of line chart series, in points */
export const LINE_SERIES_WIDTH = 3;

function assertSameLength(itemType: string, labels: readonly unknown[], values: readonly number[]): void {
  if (labels.length !== values.length) {
    throw new ShapeMismatchError(
      `Chart has ${labels.length} labels but ${values.length} values`,
      itemType
    );
  }
}

/**
 * Labels and values of a chart must pair up one to one
 */
export function assertChartShape(item: ChartItem): void {
  switch (item.type) {
    case 'bar-chart':
      return assertSameLength(item.type, item.categories, item.values);
    case 'line-chart':
      return assertSameLength(item.type, item.xValues, item.yValues);
    case 'pie-chart':
      return assertSameLength(item.type, item.labels, item.values);
  }
}

export function renderBarChart(item: BarChartItem, rect: Rect, theme: Theme): ChartElement {
  assertChartShape(item);
  return {
    kind: 'chart',
    chartType: 'bar',
    rect,
    series: { name: item.seriesName, labels: [...item.categories], values: [...item.values] },
    legend: 'bottom',
    xLabel: item.xLabel,
    yLabel: item.yLabel,
    seriesFill: theme.palette.primary,
  };
}

export function renderLineChart(item: LineChartItem, rect: Rect, theme: Theme): ChartElement {
  assertChartShape(item);
  return {
    kind: 'chart',
    chartType: 'line',
    rect,
    series: {
      name: item.seriesName,
      labels: item.xValues.map(value => String(value)),
      values: [...item.yValues],
    },
    legend: 'bottom',
    xLabel: item.xLabel,
    yLabel: item.yLabel,
    seriesLine: { color: theme.palette.secondary, width: LINE_SERIES_WIDTH },
  };
}

export function renderPieChart(item: PieChartItem, rect: Rect): ChartElement {
  assertChartShape(item);
  return {
    kind: 'chart',
    chartType: 'pie',
    rect,
    series: { name: PIE_SERIES_NAME, labels: [...item.labels], values: [...item.values] },
    legend: 'right',
  };
}

export function renderChart(item: ChartItem, rect: Rect, theme: Theme): ChartElement {
  switch (item.type) {
    case 'bar-chart':
      return renderBarChart(item, rect, theme);
    case 'line-chart':
      return renderLineChart(item, rect, theme);
    case 'pie-chart':
      return renderPieChart(item, rect);
  }
}
