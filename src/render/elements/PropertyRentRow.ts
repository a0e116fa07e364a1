/**
 * PropertyRentRow - One line of a property card's rent table
 *
 * Layout (left to right):
 *   [house glyph with count badge]  . . . . . . . .  $<rent>M
 *
 * The row is centered vertically on `y`; spacing between rows is up to
 * the caller.
 */

import type { SKRSContext2D } from '@napi-rs/canvas';
import { DEFAULT_RENDER_CONFIG } from '../../config/renderConfig';
import type { ColorInput } from '../primitives/color';
import { drawCircle, drawPolygon, drawRect } from '../primitives/shapes';
import { drawText } from '../primitives/text';
import { formatMillions } from './ValueBadge';

export interface RentRowLayout {
  /** Left edge of the row */
  xStart: number;
  rowWidth: number;
  fontFamily: string;
}

export const DEFAULT_RENT_ROW_LAYOUT: RentRowLayout = {
  xStart: 50,
  rowWidth: 300,
  fontFamily: DEFAULT_RENDER_CONFIG.fontFamily,
};

const ICON_SIZE = 40;
const ICON_INSET = 20;
const COUNT_BADGE_RADIUS = 18;
const DOT_SPACING = 10;
const DOT_COLOR = '#505050';
const OUTLINE = '#000000';

export function drawPropertyRentRow(
  ctx: SKRSContext2D,
  y: number,
  count: number,
  rentAmount: number,
  iconColor: ColorInput,
  layout: Partial<RentRowLayout> = {},
): void {
  const { xStart, rowWidth, fontFamily } = { ...DEFAULT_RENT_ROW_LAYOUT, ...layout };
  const iconX = xStart + ICON_INSET;
  const houseY = y - Math.floor(ICON_SIZE / 2);
  const eaveY = houseY + Math.floor(ICON_SIZE / 3);

  // House body and roof
  drawRect(
    ctx,
    { x1: iconX, y1: eaveY, x2: iconX + ICON_SIZE, y2: houseY + ICON_SIZE },
    { fill: iconColor, outline: OUTLINE, width: 2 },
  );
  drawPolygon(
    ctx,
    [
      { x: iconX, y: eaveY },
      { x: iconX + Math.floor(ICON_SIZE / 2), y: houseY },
      { x: iconX + ICON_SIZE, y: eaveY },
    ],
    { fill: iconColor, outline: OUTLINE },
  );

  // Count badge
  const badgeCenter = { x: iconX + Math.floor(ICON_SIZE / 2), y };
  drawCircle(ctx, badgeCenter, COUNT_BADGE_RADIUS, { fill: '#FFFFFF', outline: OUTLINE, width: 2 });
  drawText(ctx, String(count), badgeCenter, { family: fontFamily, size: 16, bold: true }, OUTLINE, 'mm');

  // Dotted connector
  const dotsEnd = xStart + rowWidth - 80;
  for (let x = iconX + ICON_SIZE + ICON_INSET; x < dotsEnd; x += DOT_SPACING) {
    drawCircle(ctx, { x: x + 1.5, y: y - 0.5 }, 1.5, { fill: DOT_COLOR });
  }

  drawText(
    ctx,
    formatMillions(rentAmount),
    { x: xStart + rowWidth - 50, y },
    { family: fontFamily, size: 18, bold: true },
    OUTLINE,
    'rm',
  );
}
