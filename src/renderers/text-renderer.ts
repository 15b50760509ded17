/**
 * Text renderers
 *
 * Turn text flow items into paragraphs of a single text box.
 */

import { Paragraph, Rect, TextBoxElement } from '../models/deck.model';
import { TextFlowItem } from '../models/topic.model';
import { emphasisStyle } from '../theme/style-table';
import { Theme } from '../theme/theme';

export interface TextLineOptions {
  /** Indentation level, 0 by default */
  level?: number;
  /** Overrides the theme text color */
  color?: string;
}

/**
 * One body line at the body font size
 */
export function renderTextLine(text: string, theme: Theme, options: TextLineOptions = {}): Paragraph {
  return {
    level: options.level ?? 0,
    runs: [
      {
        text,
        fontSize: theme.fonts.body,
        color: options.color ?? theme.palette.text,
      },
    ],
  };
}

/**
 * Glyph run followed by an italic run in the kind's color.
 * The glyph keeps the backend's default color.
 */
export function renderEmphasis(kind: string, text: string, theme: Theme): Paragraph {
  const style = emphasisStyle(kind, theme);
  return {
    level: 0,
    runs: [
      { text: style.glyph, fontSize: theme.fonts.emphasis },
      { text, fontSize: theme.fonts.emphasis, italic: true, color: style.color },
    ],
  };
}

/**
 * Paragraphs for one text flow item, in order
 */
export function renderTextItem(item: TextFlowItem, theme: Theme): Paragraph[] {
  switch (item.type) {
    case 'text':
      return [renderTextLine(item.text, theme)];
    case 'emphasis':
      return [renderEmphasis(item.kind, item.text, theme)];
    case 'unrecognized':
      return [renderEmphasis(item.tag, item.text, theme)];
    case 'components':
      return item.items.map(entry => renderTextLine(entry, theme, { level: 1 }));
    case 'solution':
      return item.steps.map(step =>
        renderTextLine(step, theme, { level: 1, color: theme.palette.accent })
      );
  }
}

/**
 * Single word-wrapped text box holding every item in content order
 */
export function renderTextFlow(
  items: readonly TextFlowItem[],
  rect: Rect,
  theme: Theme
): TextBoxElement {
  return {
    kind: 'text-box',
    rect,
    wordWrap: true,
    paragraphs: items.flatMap(item => renderTextItem(item, theme)),
  };
}
