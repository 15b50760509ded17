/**
 * Slide Builder
 *
 * Composes one content slide: title, decorative rule, then a body that is
 * either a single text flow or the slide's tables and charts.
 */

import { partitionContent } from '../layout/classifier';
import { placeVisuals } from '../layout/placement';
import { DeckElement, DeckSlide, RuleElement, TextBoxElement } from '../models/deck.model';
import { ContentItem } from '../models/topic.model';
import { renderTextFlow, renderVisual } from '../renderers';
import { defaultLogger, Logger } from '../logging/console-logger';
import { Theme, DEFAULT_THEME } from '../theme/theme';

export interface SlideBuildOptions {
  theme?: Theme;
  logger?: Logger;
}

export function renderSlideTitle(title: string, theme: Theme): TextBoxElement {
  return {
    kind: 'text-box',
    rect: theme.geometry.slideTitle,
    wordWrap: true,
    paragraphs: [
      {
        level: 0,
        align: 'left',
        runs: [
          {
            text: title,
            fontSize: theme.fonts.slideTitle,
            bold: true,
            color: theme.palette.primary,
          },
        ],
      },
    ],
  };
}

export function renderTitleRule(theme: Theme): RuleElement {
  const { x, y, w, width } = theme.geometry.rule;
  return { kind: 'rule', x, y, w, width, color: theme.palette.accent };
}

export function buildContentSlide(
  title: string,
  items: readonly ContentItem[],
  options: SlideBuildOptions = {}
): DeckSlide {
  const theme = options.theme ?? DEFAULT_THEME;
  const logger = options.logger ?? defaultLogger;
  const elements: DeckElement[] = [renderSlideTitle(title, theme), renderTitleRule(theme)];
  const partition = partitionContent(items);

  if (partition.mode === 'split') {
    if (partition.text.length > 0) {
      logger.warn(`Slide "${title}" has tables or charts; dropping ${partition.text.length} text item(s)`, {
        dropped: partition.text.map(item => item.type),
      });
    }
    const rects = placeVisuals(partition.visuals, theme);
    partition.visuals.forEach((visual, index) => {
      elements.push(renderVisual(visual, rects[index], theme));
    });
  } else if (partition.text.length > 0) {
    elements.push(renderTextFlow(partition.text, theme.geometry.body, theme));
  }

  return { role: 'content', layoutMode: partition.mode, elements };
}
