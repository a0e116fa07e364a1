/**
 * Text primitives
 *
 * Single-line anchored text and word-wrapped paragraphs. Wrapping uses an
 * average glyph width (the width of "M") times a character budget rather
 * than measuring every glyph.
 */

import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import { toCssColor, type ColorInput } from './color';
import type { Point } from './shapes';

export interface FontSpec {
  family: string;
  size: number;
  bold?: boolean;
}

/**
 * Two-letter anchor: horizontal (l/m/r) then vertical (t/m)
 */
export type TextAnchor = 'lt' | 'mt' | 'lm' | 'mm' | 'rm';

export type TextAlign = 'left' | 'center' | 'right';

const ANCHORS: Record<TextAnchor, { align: TextAlign; baseline: 'top' | 'middle' }> = {
  lt: { align: 'left', baseline: 'top' },
  mt: { align: 'center', baseline: 'top' },
  lm: { align: 'left', baseline: 'middle' },
  mm: { align: 'center', baseline: 'middle' },
  rm: { align: 'right', baseline: 'middle' },
};

const REFERENCE_GLYPH = 'M';
const MIN_CHARS_PER_LINE = 10;
/** Glyph width relative to font size when no font face resolves */
const FALLBACK_GLYPH_RATIO = 0.6;

let measureContext: SKRSContext2D | null = null;

export function toCssFont(font: FontSpec): string {
  return `${font.bold ? 'bold ' : ''}${font.size}px ${font.family}`;
}

export function drawText(
  ctx: SKRSContext2D,
  text: string,
  position: Point,
  font: FontSpec,
  color: ColorInput = '#000000',
  anchor: TextAnchor = 'lt',
): void {
  const { align, baseline } = ANCHORS[anchor];

  ctx.font = toCssFont(font);
  ctx.fillStyle = toCssColor(color);
  ctx.textAlign = align;
  ctx.textBaseline = baseline;
  ctx.fillText(text, position.x, position.y);
}

function referenceGlyphWidth(font: FontSpec): number {
  if (!measureContext) {
    measureContext = createCanvas(1, 1).getContext('2d');
  }
  measureContext.font = toCssFont(font);
  const width = measureContext.measureText(REFERENCE_GLYPH).width;

  return width > 0 ? width : font.size * FALLBACK_GLYPH_RATIO;
}

/**
 * Greedy word wrap to a fixed character budget. A word longer than the
 * budget fills what is left of the current line, then carries on below.
 */
export function wrapText(text: string, charsPerLine: number): string[] {
  const width = Math.max(1, Math.floor(charsPerLine));
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    let rest = word;
    while (rest.length > 0) {
      if (!currentLine) {
        currentLine = rest.slice(0, width);
        rest = rest.slice(width);
        if (rest.length > 0) {
          lines.push(currentLine);
          currentLine = '';
        }
      } else if (currentLine.length + 1 + rest.length <= width) {
        currentLine = `${currentLine} ${rest}`;
        rest = '';
      } else {
        const space = width - currentLine.length - 1;
        if (rest.length > width && space > 0) {
          currentLine = `${currentLine} ${rest.slice(0, space)}`;
          rest = rest.slice(space);
        }
        lines.push(currentLine);
        currentLine = '';
      }
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }
  return lines;
}

/**
 * Wrap text into lines that fit roughly within `maxWidthPx`.
 * Blank paragraphs are kept as empty lines.
 */
export function measureAndWrapText(text: string, font: FontSpec, maxWidthPx: number): string[] {
  const charsPerLine = Math.max(
    MIN_CHARS_PER_LINE,
    Math.floor(maxWidthPx / referenceGlyphWidth(font)),
  );

  return text
    .split('\n')
    .flatMap((paragraph) => (paragraph.trim() ? wrapText(paragraph, charsPerLine) : ['']));
}

export interface MultilineTextOptions {
  color?: ColorInput;
  /** Wrap width in pixels, default 300 */
  maxWidth?: number;
  /** Line height multiplier, default 1.2 */
  lineSpacing?: number;
  align?: TextAlign;
}

/**
 * Draw word-wrapped text starting at the top-left `position`
 *
 * @returns Y position after the last line
 */
export function drawMultilineText(
  ctx: SKRSContext2D,
  text: string,
  position: Point,
  font: FontSpec,
  options: MultilineTextOptions = {},
): number {
  const { color = '#000000', maxWidth = 300, lineSpacing = 1.2, align = 'left' } = options;
  const lines = measureAndWrapText(text, font, maxWidth);
  const lineHeight = Math.floor(font.size * lineSpacing);

  let y = position.y;
  for (const line of lines) {
    let x = position.x;
    if (align !== 'left') {
      ctx.font = toCssFont(font);
      const textWidth = ctx.measureText(line).width;
      x = align === 'center'
        ? position.x + Math.floor((maxWidth - textWidth) / 2)
        : position.x + maxWidth - textWidth;
    }

    drawText(ctx, line, { x, y }, font, color, 'lt');
    y += lineHeight;
  }

  return y;
}
