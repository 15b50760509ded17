/**
 * Theme Tests
 */

import { createTheme, DEFAULT_PALETTE, DEFAULT_THEME } from './theme';

describe('theme', () => {
  it('should use the 4:3 slide size', () => {
    expect(DEFAULT_THEME.geometry.slideWidth).toBe(10);
    expect(DEFAULT_THEME.geometry.slideHeight).toBe(7.5);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(DEFAULT_THEME)).toBe(true);
    expect(Object.isFrozen(DEFAULT_THEME.palette)).toBe(true);
    expect(Object.isFrozen(DEFAULT_THEME.geometry.body)).toBe(true);
  });

  it('should apply overrides per section', () => {
    const theme = createTheme({ palette: { primary: '112233' }, fonts: { body: 20 } });

    expect(theme.palette.primary).toBe('112233');
    expect(theme.palette.accent).toBe(DEFAULT_PALETTE.accent);
    expect(theme.fonts.body).toBe(20);
    expect(theme.fonts.slideTitle).toBe(32);
  });
});
