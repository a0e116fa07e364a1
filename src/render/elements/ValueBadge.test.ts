import { createCanvas } from '@napi-rs/canvas';
import { describe, expect, it } from 'vitest';
import { drawValueBadge, formatMillions } from './ValueBadge';

describe('formatMillions', () => {
  it('formats values in millions', () => {
    expect(formatMillions(5)).toBe('$5M');
    expect(formatMillions(10)).toBe('$10M');
  });
});

describe('drawValueBadge', () => {
  it('draws a circle of the given diameter around the center', () => {
    const ctx = createCanvas(100, 100).getContext('2d');

    drawValueBadge(ctx, 3, { x: 50, y: 50 }, 50, { background: '#00FF00', text: '#00FF00' });

    expect(Array.from(ctx.getImageData(50, 32, 1, 1).data)).toEqual([0, 255, 0, 255]);
    expect(ctx.getImageData(50, 10, 1, 1).data[3]).toBe(0);
  });
});
