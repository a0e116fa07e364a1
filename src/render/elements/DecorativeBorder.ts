/**
 * DecorativeBorder - Frame drawn inside the card edge
 *
 * Patterns:
 * - chain_link: dashed perimeter (15px segments, 5px gaps, 3px lines)
 * - double: two nested 2px rectangles, 5px apart
 * - solid: one rectangle, `borderWidth` thick
 *
 * The pattern set is closed. Token values are checked with
 * `parseBorderPattern`, which rejects unknown names instead of falling
 * back to `solid`.
 */

import type { SKRSContext2D } from '@napi-rs/canvas';
import { InvalidTokenValueError } from '../../errors';
import type { ColorInput } from '../primitives/color';
import { drawLine, drawRect } from '../primitives/shapes';

export const BORDER_PATTERNS = ['chain_link', 'double', 'solid'] as const;

export type BorderPattern = (typeof BORDER_PATTERNS)[number];

export interface DecorativeBorderOptions {
  /** Line width of the solid pattern */
  borderWidth: number;
  color: ColorInput;
  pattern: BorderPattern;
}

export const DEFAULT_BORDER_OPTIONS: DecorativeBorderOptions = {
  borderWidth: 15,
  color: '#505050',
  pattern: 'chain_link',
};

const MARGIN = 10;
const SEGMENT_LENGTH = 15;
const SEGMENT_GAP = 5;
const CHAIN_LINE_WIDTH = 3;
const DOUBLE_LINE_WIDTH = 2;
const DOUBLE_INSET = 5;

export function parseBorderPattern(value: string, path: string): BorderPattern {
  const pattern = BORDER_PATTERNS.find((candidate) => candidate === value);
  if (pattern === undefined) {
    throw new InvalidTokenValueError(path, value, `one of ${BORDER_PATTERNS.join(', ')}`);
  }
  return pattern;
}

function drawChainLink(
  ctx: SKRSContext2D,
  width: number,
  height: number,
  color: ColorInput,
): void {
  const step = SEGMENT_LENGTH + SEGMENT_GAP;

  // Top and bottom
  for (let x = MARGIN; x < width - MARGIN; x += step) {
    const xEnd = Math.min(x + SEGMENT_LENGTH, width - MARGIN);
    drawLine(ctx, { x, y: MARGIN }, { x: xEnd, y: MARGIN }, color, CHAIN_LINE_WIDTH);
    drawLine(ctx, { x, y: height - MARGIN }, { x: xEnd, y: height - MARGIN }, color, CHAIN_LINE_WIDTH);
  }

  // Left and right
  for (let y = MARGIN; y < height - MARGIN; y += step) {
    const yEnd = Math.min(y + SEGMENT_LENGTH, height - MARGIN);
    drawLine(ctx, { x: MARGIN, y }, { x: MARGIN, y: yEnd }, color, CHAIN_LINE_WIDTH);
    drawLine(ctx, { x: width - MARGIN, y }, { x: width - MARGIN, y: yEnd }, color, CHAIN_LINE_WIDTH);
  }
}

export function drawDecorativeBorder(
  ctx: SKRSContext2D,
  cardSize: { width: number; height: number },
  options: Partial<DecorativeBorderOptions> = {},
): void {
  const { borderWidth, color, pattern } = { ...DEFAULT_BORDER_OPTIONS, ...options };
  const { width, height } = cardSize;
  const outer = { x1: MARGIN, y1: MARGIN, x2: width - MARGIN, y2: height - MARGIN };

  switch (pattern) {
    case 'chain_link':
      drawChainLink(ctx, width, height, color);
      return;

    case 'double':
      drawRect(ctx, outer, { outline: color, width: DOUBLE_LINE_WIDTH });
      drawRect(
        ctx,
        {
          x1: outer.x1 + DOUBLE_INSET,
          y1: outer.y1 + DOUBLE_INSET,
          x2: outer.x2 - DOUBLE_INSET,
          y2: outer.y2 - DOUBLE_INSET,
        },
        { outline: color, width: DOUBLE_LINE_WIDTH },
      );
      return;

    case 'solid':
      drawRect(ctx, outer, { outline: color, width: borderWidth });
      return;

    default: {
      const unknownPattern: never = pattern;
      throw new InvalidTokenValueError('border.pattern', unknownPattern, BORDER_PATTERNS.join(', '));
    }
  }
}
