/**
 * Deck Assembler
 *
 * Cover slide first, then one content slide per topic slide, in order.
 */

import { Deck, DeckSlide, TextBoxElement } from '../models/deck.model';
import { Topic } from '../models/topic.model';
import { defaultLogger } from '../logging/console-logger';
import { DEFAULT_THEME, Theme } from '../theme/theme';

import { buildContentSlide, SlideBuildOptions } from './slide-builder';

function centeredWhiteText(
  text: string,
  rect: TextBoxElement['rect'],
  fontSize: number,
  theme: Theme,
  bold: boolean
): TextBoxElement {
  return {
    kind: 'text-box',
    rect,
    wordWrap: true,
    paragraphs: [
      {
        level: 0,
        align: 'center',
        runs: [{ text, fontSize, color: theme.palette.white, ...(bold ? { bold: true } : {}) }],
      },
    ],
  };
}

/**
 * Full-bleed cover in the primary color.
 * The subtitle box is only drawn for a non-empty subtitle.
 */
export function buildCoverSlide(title: string, subtitle: string | undefined, theme: Theme): DeckSlide {
  const { geometry, fonts } = theme;
  const elements = [
    centeredWhiteText(title, geometry.coverTitle, fonts.coverTitle, theme, true),
  ];
  if (subtitle) {
    elements.push(centeredWhiteText(subtitle, geometry.coverSubtitle, fonts.coverSubtitle, theme, false));
  }
  return { role: 'cover', background: theme.palette.primary, elements };
}

export function assembleDeck(topic: Topic, options: SlideBuildOptions = {}): Deck {
  const theme = options.theme ?? DEFAULT_THEME;
  const logger = options.logger ?? defaultLogger;
  const { title } = topic;

  const slides: DeckSlide[] = [buildCoverSlide(title, topic.subtitle, theme)];
  for (const slide of topic.slides) {
    slides.push(buildContentSlide(slide.title, slide.content, { theme, logger }));
  }

  logger.debug(`Assembled deck "${title}"`, { slides: slides.length });

  return {
    title,
    width: theme.geometry.slideWidth,
    height: theme.geometry.slideHeight,
    slides,
  };
}
