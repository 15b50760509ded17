/**
 * Topic Model
 *
 * Typed shape of a topic document once decoded from its YAML source.
 * A Topic is built once per input file and never mutated afterwards.
 */

/**
 * Semantic kinds of highlighted blocks
 */
export type EmphasisKind =
  | 'note'        // nota
  | 'example'     // ejemplo
  | 'problem'     // problema
  | 'formula'     // formula
  | 'computation'; // calculo

export const EMPHASIS_KINDS: readonly EmphasisKind[] = [
  'note',
  'example',
  'problem',
  'formula',
  'computation',
];

/**
 * Free body line
 */
export interface PlainTextItem {
  type: 'text';
  text: string;
}

/**
 * Highlighted block drawn with the kind's glyph and color
 */
export interface EmphasisItem {
  type: 'emphasis';
  kind: EmphasisKind;
  text: string;
}

/**
 * Indented list of components
 */
export interface ComponentListItem {
  type: 'components';
  items: string[];
}

/**
 * Indented, accent-colored solution steps
 */
export interface SolutionStepsItem {
  type: 'solution';
  steps: string[];
}

export interface TableItem {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface BarChartItem {
  type: 'bar-chart';
  categories: string[];
  values: number[];
  xLabel: string;
  yLabel: string;
  seriesName: string;
}

export interface LineChartItem {
  type: 'line-chart';
  /** Displayed as strings on the category axis */
  xValues: (string | number)[];
  yValues: number[];
  xLabel: string;
  yLabel: string;
  seriesName: string;
}

export interface PieChartItem {
  type: 'pie-chart';
  labels: string[];
  values: number[];
}

/**
 * Tagged item whose tag is not one we know.
 * Drawn with the neutral marker instead of failing the slide.
 */
export interface UnrecognizedItem {
  type: 'unrecognized';
  tag: string;
  text: string;
}

export type ChartItem = BarChartItem | LineChartItem | PieChartItem;

/**
 * Items that claim a fixed rectangle of the slide instead of joining the text flow
 */
export type VisualItem = TableItem | ChartItem;

export type TextFlowItem =
  | PlainTextItem
  | EmphasisItem
  | ComponentListItem
  | SolutionStepsItem
  | UnrecognizedItem;

export type ContentItem = TextFlowItem | VisualItem;

export type ContentItemType = ContentItem['type'];

export interface Slide {
  title: string;
  content: ContentItem[];
}

export interface Topic {
  title: string;
  subtitle?: string;
  slides: Slide[];
}

/** Placeholder used for any missing title */
export const UNTITLED = 'Sin título';

/** Series name used when a bar or line chart does not name its series */
export const DEFAULT_SERIES_NAME = 'Serie';

/** Pie charts always carry a single series with this name */
export const PIE_SERIES_NAME = 'Serie 1';

/**
 * Check whether an item claims its own rectangle (table or chart)
 */
export function isVisualItem(item: ContentItem): item is VisualItem {
  return (
    item.type === 'table' ||
    item.type === 'bar-chart' ||
    item.type === 'line-chart' ||
    item.type === 'pie-chart'
  );
}
