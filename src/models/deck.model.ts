/**
 * Deck Model
 *
 * Backend-neutral drawing instructions produced by the slide builders.
 * Geometry is in inches, font sizes in points, colors are six-digit hex
 * strings without a leading '#'.
 */

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export type HorizontalAlign = 'left' | 'center' | 'right';

/**
 * One styled span of text
 */
export interface TextRun {
  text: string;
  fontSize: number;
  bold?: boolean;
  italic?: boolean;
  /** Unset means the backend's default color */
  color?: string;
}

export interface Paragraph {
  runs: TextRun[];
  /** Indentation level, 0 for top-level text */
  level: number;
  align?: HorizontalAlign;
}

export interface TextBoxElement {
  kind: 'text-box';
  rect: Rect;
  paragraphs: Paragraph[];
  wordWrap: boolean;
}

/**
 * Straight horizontal line
 */
export interface RuleElement {
  kind: 'rule';
  x: number;
  y: number;
  w: number;
  color: string;
  /** Line width in points */
  width: number;
}

export interface TableCell {
  text: string;
  fontSize: number;
  align: HorizontalAlign;
  bold?: boolean;
  color?: string;
  /** Background fill, unset for no fill */
  fill?: string;
}

export interface TableElement {
  kind: 'table';
  rect: Rect;
  /** Row 0 is the header row */
  rows: TableCell[][];
}

export type ChartType = 'bar' | 'line' | 'pie';

export type LegendPosition = 'bottom' | 'right';

export interface ChartSeries {
  name: string;
  labels: string[];
  values: number[];
}

export interface ChartElement {
  kind: 'chart';
  chartType: ChartType;
  rect: Rect;
  series: ChartSeries;
  legend: LegendPosition;
  xLabel?: string;
  yLabel?: string;
  /** Solid fill applied to the series (bar) */
  seriesFill?: string;
  /** Stroke applied to the series (line) */
  seriesLine?: { color: string; width: number };
}

export type DeckElement = TextBoxElement | RuleElement | TableElement | ChartElement;

export type LayoutMode = 'text-only' | 'split';

export interface DeckSlide {
  role: 'cover' | 'content';
  /** Set on content slides only */
  layoutMode?: LayoutMode;
  background?: string;
  elements: DeckElement[];
}

export interface Deck {
  title: string;
  width: number;
  height: number;
  slides: DeckSlide[];
}
