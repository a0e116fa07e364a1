/**
 * ValueBadge - Circular "$<value>M" badge drawn in card corners
 */

import type { SKRSContext2D } from '@napi-rs/canvas';
import { DEFAULT_RENDER_CONFIG } from '../../config/renderConfig';
import type { ColorInput } from '../primitives/color';
import { drawCircle, type Point } from '../primitives/shapes';
import { drawText } from '../primitives/text';

export interface ValueBadgeStyle {
  background: ColorInput;
  border: ColorInput;
  text: ColorInput;
  borderWidth: number;
  fontFamily: string;
}

export const DEFAULT_BADGE_DIAMETER = 50;

export const DEFAULT_VALUE_BADGE_STYLE: ValueBadgeStyle = {
  background: '#FFFFFF',
  border: '#000000',
  text: '#000000',
  borderWidth: 3,
  fontFamily: DEFAULT_RENDER_CONFIG.fontFamily,
};

/**
 * Money label used on badges and rent rows, e.g. `$5M`
 */
export function formatMillions(value: number): string {
  return `$${value}M`;
}

export function drawValueBadge(
  ctx: SKRSContext2D,
  value: number,
  center: Point,
  diameter: number = DEFAULT_BADGE_DIAMETER,
  style: Partial<ValueBadgeStyle> = {},
): void {
  const { background, border, text, borderWidth, fontFamily } = {
    ...DEFAULT_VALUE_BADGE_STYLE,
    ...style,
  };
  const radius = Math.floor(diameter / 2);

  drawCircle(ctx, center, radius, { fill: background, outline: border, width: borderWidth });
  drawText(
    ctx,
    formatMillions(value),
    center,
    { family: fontFamily, size: Math.floor(diameter / 3), bold: true },
    text,
    'mm',
  );
}
