import type { SKRSContext2D } from '@napi-rs/canvas';
import type { ColorInput } from '../primitives/color';
import { drawRect } from '../primitives/shapes';

export interface StripeSpan {
  xStart: number;
  xEnd: number;
}

export const DEFAULT_STRIPE_SPAN: StripeSpan = { xStart: 30, xEnd: 383 };

/**
 * Split the span into equal blocks, one per color, and outline them as a
 * unit. Draws nothing for an empty color list.
 */
export function drawColorStripes(
  ctx: SKRSContext2D,
  colors: readonly ColorInput[],
  y: number,
  height: number,
  span: Partial<StripeSpan> = {},
): void {
  if (colors.length === 0) return;

  const { xStart, xEnd } = { ...DEFAULT_STRIPE_SPAN, ...span };
  const stripeWidth = Math.floor((xEnd - xStart) / colors.length);

  colors.forEach((color, index) => {
    const x1 = xStart + index * stripeWidth;
    drawRect(ctx, { x1, y1: y, x2: x1 + stripeWidth, y2: y + height }, { fill: color });
  });

  drawRect(ctx, { x1: xStart, y1: y, x2: xEnd, y2: y + height }, { outline: '#000000', width: 2 });
}
