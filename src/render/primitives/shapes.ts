/**
 * Shape primitives
 *
 * Stateless helpers that trace and paint basic shapes on a 2D context.
 * Colors are resolved through `toCssColor`, so hex strings and RGB(A)
 * values are both accepted.
 */

import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { toCssColor, type ColorInput } from './color';

export interface Point {
  x: number;
  y: number;
}

/**
 * Axis-aligned box given by its top-left and bottom-right corners
 */
export interface Box {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface ShapeStyle {
  fill?: ColorInput;
  outline?: ColorInput;
  /** Outline width in pixels, default 1 */
  width?: number;
}

/**
 * Fill and stroke the current path
 */
function paintPath(ctx: SKRSContext2D, style: ShapeStyle): void {
  const fill = style.fill === undefined ? null : toCssColor(style.fill);
  const outline = style.outline === undefined ? null : toCssColor(style.outline);

  if (fill) {
    ctx.fillStyle = fill;
    ctx.fill();
  }
  if (outline) {
    ctx.strokeStyle = outline;
    ctx.lineWidth = style.width ?? 1;
    ctx.stroke();
  }
}

/**
 * Create a rounded rectangle path
 */
export function traceRoundedRect(
  ctx: SKRSContext2D,
  x: number,
  y: number,
  width: number,
  height: number,
  radius: number,
): void {
  // Clamp radius to half the smallest dimension
  const r = Math.max(0, Math.min(radius, width / 2, height / 2));

  ctx.beginPath();
  ctx.moveTo(x + r, y);
  ctx.lineTo(x + width - r, y);
  ctx.quadraticCurveTo(x + width, y, x + width, y + r);
  ctx.lineTo(x + width, y + height - r);
  ctx.quadraticCurveTo(x + width, y + height, x + width - r, y + height);
  ctx.lineTo(x + r, y + height);
  ctx.quadraticCurveTo(x, y + height, x, y + height - r);
  ctx.lineTo(x, y + r);
  ctx.quadraticCurveTo(x, y, x + r, y);
  ctx.closePath();
}

export function drawRoundedRect(
  ctx: SKRSContext2D,
  box: Box,
  radius: number,
  style: ShapeStyle,
): void {
  traceRoundedRect(ctx, box.x1, box.y1, box.x2 - box.x1, box.y2 - box.y1, radius);
  paintPath(ctx, style);
}

export function drawRect(ctx: SKRSContext2D, box: Box, style: ShapeStyle): void {
  ctx.beginPath();
  ctx.rect(box.x1, box.y1, box.x2 - box.x1, box.y2 - box.y1);
  paintPath(ctx, style);
}

export function drawCircle(
  ctx: SKRSContext2D,
  center: Point,
  radius: number,
  style: ShapeStyle,
): void {
  ctx.beginPath();
  ctx.arc(center.x, center.y, radius, 0, Math.PI * 2);
  ctx.closePath();
  paintPath(ctx, style);
}

/**
 * Draw a pie slice. Angles are in degrees, clockwise from 3 o'clock.
 */
export function drawPieSlice(
  ctx: SKRSContext2D,
  center: Point,
  radius: number,
  startAngleDeg: number,
  endAngleDeg: number,
  style: ShapeStyle,
): void {
  const toRadians = (deg: number) => (deg * Math.PI) / 180;

  ctx.beginPath();
  ctx.moveTo(center.x, center.y);
  ctx.arc(center.x, center.y, radius, toRadians(startAngleDeg), toRadians(endAngleDeg));
  ctx.closePath();
  paintPath(ctx, style);
}

export function drawPolygon(ctx: SKRSContext2D, points: readonly Point[], style: ShapeStyle): void {
  if (points.length === 0) return;

  ctx.beginPath();
  ctx.moveTo(points[0].x, points[0].y);
  for (const point of points.slice(1)) {
    ctx.lineTo(point.x, point.y);
  }
  ctx.closePath();
  paintPath(ctx, style);
}

export function drawLine(
  ctx: SKRSContext2D,
  from: Point,
  to: Point,
  color: ColorInput,
  width: number = 1,
): void {
  ctx.beginPath();
  ctx.moveTo(from.x, from.y);
  ctx.lineTo(to.x, to.y);
  ctx.strokeStyle = toCssColor(color);
  ctx.lineWidth = width;
  ctx.stroke();
}

/**
 * Allocate a transparent canvas and paint a rounded-rectangle background
 */
export function createCardCanvas(
  width: number,
  height: number,
  backgroundColor: ColorInput,
  cornerRadius: number,
): Canvas {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');

  drawRoundedRect(ctx, { x1: 0, y1: 0, x2: width, y2: height }, cornerRadius, {
    fill: backgroundColor,
  });

  return canvas;
}
