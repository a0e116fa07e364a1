export { hexToColor, toCssColor, type ColorInput, type RGB, type RGBA } from './color';
export {
  createCardCanvas,
  drawCircle,
  drawLine,
  drawPieSlice,
  drawPolygon,
  drawRect,
  drawRoundedRect,
  traceRoundedRect,
  type Box,
  type Point,
  type ShapeStyle,
} from './shapes';
export {
  drawMultilineText,
  drawText,
  measureAndWrapText,
  toCssFont,
  wrapText,
  type FontSpec,
  type MultilineTextOptions,
  type TextAlign,
  type TextAnchor,
} from './text';
