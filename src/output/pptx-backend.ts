/**
 * Presentation backend
 *
 * Draws a Deck with pptxgenjs and serializes it to a .pptx file.
 */

import PptxGenJS from 'pptxgenjs';

import { OutputWriteError, toError } from '../errors';
import {
  ChartElement,
  Deck,
  DeckElement,
  LegendPosition,
  Paragraph,
  TableElement,
  TextBoxElement,
} from '../models/deck.model';

import { writeBinaryOutput } from './output-writer';

/** Name of the custom slide size registered on every presentation */
export const DECK_LAYOUT_NAME = 'TOPIC_DECK';

/**
 * The slice of a pptxgenjs slide the backend draws with
 */
export interface PresentationSlide {
  background?: PptxGenJS.BackgroundProps;
  addText(text: PptxGenJS.TextProps[], options: PptxGenJS.TextPropsOptions): unknown;
  addShape(shape: PptxGenJS.SHAPE_NAME, options: PptxGenJS.ShapeProps): unknown;
  addTable(rows: PptxGenJS.TableRow[], options: PptxGenJS.TableProps): unknown;
  addChart(
    type: PptxGenJS.CHART_NAME,
    data: PptxGenJS.OptsChartData[],
    options: PptxGenJS.IChartOpts
  ): unknown;
}

/**
 * The slice of a pptxgenjs presentation the backend uses
 */
export interface PresentationDocument {
  layout: string;
  title: string;
  defineLayout(layout: PptxGenJS.PresLayout): void;
  addSlide(): PresentationSlide;
  write(props: PptxGenJS.WriteProps): Promise<unknown>;
}

export type PresentationFactory = () => PresentationDocument;

const createPptx: PresentationFactory = () => new PptxGenJS();

const LEGEND_POSITIONS: Record<LegendPosition, 'b' | 'r'> = {
  bottom: 'b',
  right: 'r',
};

/**
 * Flatten paragraphs into pptxgenjs runs; the last run of each paragraph
 * but the final one ends the line.
 */
export function toTextRuns(paragraphs: readonly Paragraph[]): PptxGenJS.TextProps[] {
  const runs: PptxGenJS.TextProps[] = [];

  paragraphs.forEach((paragraph, paragraphIndex) => {
    const lastParagraph = paragraphIndex === paragraphs.length - 1;
    paragraph.runs.forEach((run, runIndex) => {
      const options: PptxGenJS.TextPropsOptions = {
        fontSize: run.fontSize,
        indentLevel: paragraph.level,
      };
      if (paragraph.align) options.align = paragraph.align;
      if (run.bold) options.bold = true;
      if (run.italic) options.italic = true;
      if (run.color) options.color = run.color;
      if (!lastParagraph && runIndex === paragraph.runs.length - 1) {
        options.breakLine = true;
      }
      runs.push({ text: run.text, options });
    });
  });

  return runs;
}

function drawTextBox(slide: PresentationSlide, element: TextBoxElement): void {
  const { x, y, w, h } = element.rect;
  slide.addText(toTextRuns(element.paragraphs), { x, y, w, h, valign: 'top', wrap: element.wordWrap });
}

function drawTable(slide: PresentationSlide, element: TableElement): void {
  const rows: PptxGenJS.TableRow[] = element.rows.map(row =>
    row.map(cell => {
      const options: PptxGenJS.TableCellProps = { fontSize: cell.fontSize, align: cell.align };
      if (cell.bold) options.bold = true;
      if (cell.color) options.color = cell.color;
      if (cell.fill) options.fill = { color: cell.fill };
      return { text: cell.text, options };
    })
  );
  const { x, y, w, h } = element.rect;
  slide.addTable(rows, { x, y, w, h });
}

function drawChart(slide: PresentationSlide, element: ChartElement): void {
  const { x, y, w, h } = element.rect;
  const options: PptxGenJS.IChartOpts = {
    x,
    y,
    w,
    h,
    showLegend: true,
    legendPos: LEGEND_POSITIONS[element.legend],
  };

  if (element.chartType === 'bar') {
    options.barDir = 'col';
    options.barGrouping = 'clustered';
  }
  if (element.seriesFill) {
    options.chartColors = [element.seriesFill];
  }
  if (element.seriesLine) {
    options.chartColors = [element.seriesLine.color];
    options.lineSize = element.seriesLine.width;
  }
  if (element.xLabel) {
    options.showCatAxisTitle = true;
    options.catAxisTitle = element.xLabel;
  }
  if (element.yLabel) {
    options.showValAxisTitle = true;
    options.valAxisTitle = element.yLabel;
  }

  const { name, labels, values } = element.series;
  slide.addChart(element.chartType, [{ name, labels, values }], options);
}

function drawElement(slide: PresentationSlide, element: DeckElement): void {
  switch (element.kind) {
    case 'text-box':
      drawTextBox(slide, element);
      break;
    case 'rule':
      slide.addShape('line', {
        x: element.x,
        y: element.y,
        w: element.w,
        h: 0,
        line: { color: element.color, width: element.width },
      });
      break;
    case 'table':
      drawTable(slide, element);
      break;
    case 'chart':
      drawChart(slide, element);
      break;
  }
}

/**
 * Draw every slide of the deck onto a new presentation
 */
export function renderPresentation(
  deck: Deck,
  createPresentation: PresentationFactory = createPptx
): PresentationDocument {
  const pptx = createPresentation();
  pptx.defineLayout({ name: DECK_LAYOUT_NAME, width: deck.width, height: deck.height });
  pptx.layout = DECK_LAYOUT_NAME;
  pptx.title = deck.title;

  for (const deckSlide of deck.slides) {
    const slide = pptx.addSlide();
    if (deckSlide.background) {
      slide.background = { color: deckSlide.background };
    }
    for (const element of deckSlide.elements) {
      drawElement(slide, element);
    }
  }

  return pptx;
}

/**
 * Serialize a presentation to bytes
 */
export async function toPptxBytes(pptx: PresentationDocument): Promise<Uint8Array> {
  const content = await pptx.write({ outputType: 'nodebuffer' });

  if (content instanceof Uint8Array) {
    return content;
  }
  if (content instanceof ArrayBuffer) {
    return new Uint8Array(content);
  }
  if (typeof content === 'string') {
    return Buffer.from(content, 'binary');
  }
  throw new Error('pptxgenjs did not return binary output');
}

/**
 * Render the deck and write it to `destination`
 */
export async function writePresentation(
  deck: Deck,
  destination: string,
  createPresentation: PresentationFactory = createPptx
): Promise<void> {
  const pptx = renderPresentation(deck, createPresentation);
  let bytes: Uint8Array;
  try {
    bytes = await toPptxBytes(pptx);
  } catch (err) {
    throw new OutputWriteError(
      `Failed to serialize presentation for ${destination}`,
      destination,
      toError(err)
    );
  }
  writeBinaryOutput(bytes, destination);
}
