/**
 * Style Table Tests
 */

import { EMPHASIS_KINDS } from '../models/topic.model';
import { DEFAULT_MARKER, emphasisStyle } from './style-table';
import { createTheme, DEFAULT_THEME } from './theme';

describe('style-table', () => {
  describe('emphasisStyle', () => {
    it.each([
      ['note', '💡 ', 'F1C40F'],
      ['example', '📝 ', '2ECC71'],
      ['problem', '❓ ', 'E74C3C'],
      ['formula', '📐 ', '9B59B6'],
      ['computation', '🔢 ', '2980B9'],
    ])('should map %s to its glyph and color', (kind, glyph, color) => {
      expect(emphasisStyle(kind, DEFAULT_THEME)).toEqual({ glyph, color });
    });

    it('should cover every emphasis kind', () => {
      for (const kind of EMPHASIS_KINDS) {
        expect(emphasisStyle(kind, DEFAULT_THEME).glyph).not.toBe(DEFAULT_MARKER);
      }
    });

    it('should fall back to the neutral marker in the text color', () => {
      expect(emphasisStyle('definicion', DEFAULT_THEME)).toEqual({ glyph: '• ', color: '2C3E50' });
    });

    it('should not treat prototype keys as kinds', () => {
      expect(emphasisStyle('toString', DEFAULT_THEME).glyph).toBe(DEFAULT_MARKER);
    });

    it('should read colors from the given theme', () => {
      const theme = createTheme({ palette: { warning: '000000' } });

      expect(emphasisStyle('note', theme).color).toBe('000000');
    });
  });
});
