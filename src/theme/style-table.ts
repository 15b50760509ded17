/**
 * Style Table
 *
 * Maps the semantic kind of an emphasis block to its marker glyph and color.
 */

import { EmphasisKind } from '../models/topic.model';
import { Palette, Theme } from './theme';

export interface EmphasisStyle {
  glyph: string;
  color: string;
}

const EMPHASIS_STYLES: Record<EmphasisKind, { glyph: string; color: keyof Palette }> = {
  note: { glyph: '💡 ', color: 'warning' },
  example: { glyph: '📝 ', color: 'accent' },
  problem: { glyph: '❓ ', color: 'secondary' },
  formula: { glyph: '📐 ', color: 'purple' },
  computation: { glyph: '🔢 ', color: 'primary' },
};

export const DEFAULT_MARKER = '• ';

function isKnownKind(kind: string): kind is EmphasisKind {
  return Object.prototype.hasOwnProperty.call(EMPHASIS_STYLES, kind);
}

/**
 * Look up the glyph and color for a kind.
 * Unknown kinds get the neutral bullet in the text color.
 */
export function emphasisStyle(kind: string, theme: Theme): EmphasisStyle {
  if (!isKnownKind(kind)) {
    return { glyph: DEFAULT_MARKER, color: theme.palette.text };
  }
  const entry = EMPHASIS_STYLES[kind];
  return { glyph: entry.glyph, color: theme.palette[entry.color] };
}
