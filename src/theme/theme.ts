/**
 * Theme
 *
 * Palette, font sizes and slide geometry shared by every renderer.
 * Renderers receive a Theme argument instead of reading module state, so a
 * caller can derive a variant with `createTheme`.
 */

import { Rect } from '../models/deck.model';

export interface Palette {
  primary: string;
  secondary: string;
  accent: string;
  warning: string;
  purple: string;
  orange: string;
  text: string;
  lightBackground: string;
  white: string;
}

export interface FontSizes {
  coverTitle: number;
  coverSubtitle: number;
  slideTitle: number;
  body: number;
  emphasis: number;
  tableHeader: number;
  tableBody: number;
}

export interface Geometry {
  slideWidth: number;
  slideHeight: number;
  coverTitle: Rect;
  coverSubtitle: Rect;
  slideTitle: Rect;
  /** Decorative rule under the slide title (height is zero) */
  rule: { x: number; y: number; w: number; width: number };
  /** Text flow of a text-only slide, also the region tiled by several visuals */
  body: Rect;
  table: Rect;
  chart: Rect;
  pieChart: Rect;
  /** Horizontal gap between tiled visuals */
  tileGap: number;
}

export interface Theme {
  palette: Palette;
  fonts: FontSizes;
  geometry: Geometry;
}

export const DEFAULT_PALETTE: Palette = {
  primary: '2980B9',
  secondary: 'E74C3C',
  accent: '2ECC71',
  warning: 'F1C40F',
  purple: '9B59B6',
  orange: 'E67E22',
  text: '2C3E50',
  lightBackground: 'ECF0F1',
  white: 'FFFFFF',
};

export const DEFAULT_FONTS: FontSizes = {
  coverTitle: 44,
  coverSubtitle: 24,
  slideTitle: 32,
  body: 18,
  emphasis: 16,
  tableHeader: 14,
  tableBody: 12,
};

export const DEFAULT_GEOMETRY: Geometry = {
  slideWidth: 10,
  slideHeight: 7.5,
  coverTitle: { x: 0.5, y: 2.5, w: 9, h: 1.5 },
  coverSubtitle: { x: 0.5, y: 4.2, w: 9, h: 0.8 },
  slideTitle: { x: 0.5, y: 0.3, w: 9, h: 1.2 },
  rule: { x: 0.5, y: 1.4, w: 9, width: 3 },
  body: { x: 0.5, y: 1.8, w: 9, h: 5 },
  table: { x: 1, y: 2, w: 8, h: 4 },
  chart: { x: 1.5, y: 2, w: 7, h: 4.5 },
  pieChart: { x: 2, y: 1.5, w: 6, h: 5 },
  tileGap: 0.2,
};

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build a theme from the defaults with optional per-section overrides
 */
export function createTheme(overrides: {
  palette?: Partial<Palette>;
  fonts?: Partial<FontSizes>;
  geometry?: Partial<Geometry>;
} = {}): Theme {
  return deepFreeze({
    palette: { ...DEFAULT_PALETTE, ...overrides.palette },
    fonts: { ...DEFAULT_FONTS, ...overrides.fonts },
    geometry: { ...DEFAULT_GEOMETRY, ...overrides.geometry },
  });
}

export const DEFAULT_THEME: Theme = createTheme();
