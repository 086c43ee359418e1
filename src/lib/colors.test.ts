import { describe, expect, it } from 'vitest';
import { heatColor, seriesColor } from './colors';

describe('heatColor', () => {
  it('greys out missing cells', () => {
    expect(heatColor(null, [0, 100], 'sequential')).toBe('#f1f5f9');
  });

  it('maps the domain ends to the palette ends', () => {
    expect(heatColor(0, [0, 100], 'sequential')).toBe('#d1eeea');
    expect(heatColor(100, [0, 100], 'sequential')).toBe('#e6305a');
    expect(heatColor(-1, [-1, 1], 'diverging')).toBe('#1a9850');
    expect(heatColor(1, [-1, 1], 'diverging')).toBe('#d73027');
  });

  it('puts zero correlation on the middle stop', () => {
    expect(heatColor(0, [-1, 1], 'diverging')).toBe('#fee08b');
  });

  it('clamps values outside the domain and handles a flat domain', () => {
    expect(heatColor(500, [0, 100], 'sequential')).toBe('#e6305a');
    expect(heatColor(42, [42, 42], 'sequential')).toBe('#d1eeea');
  });
});

describe('seriesColor', () => {
  it('cycles through the palette', () => {
    expect(seriesColor(12)).toBe(seriesColor(0));
  });
});
