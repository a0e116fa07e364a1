import { InvalidColorFormatError } from '../../errors';

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface RGBA extends RGB {
  /** Alpha channel, 0-255 */
  a: number;
}

/**
 * Either a hex string (`#RRGGBB`, `#RRGGBBAA`, `#` optional) or a resolved color
 */
export type ColorInput = string | RGB | RGBA;

const HEX_DIGITS = /^[0-9a-f]+$/i;

/**
 * Convert a 6- or 8-digit hex string to RGB or RGBA
 */
export function hexToColor(text: string): RGB | RGBA {
  const hex = text.startsWith('#') ? text.slice(1) : text;

  if ((hex.length !== 6 && hex.length !== 8) || !HEX_DIGITS.test(hex)) {
    throw new InvalidColorFormatError(text);
  }

  const channel = (offset: number) => parseInt(hex.slice(offset, offset + 2), 16);
  const rgb: RGB = { r: channel(0), g: channel(2), b: channel(4) };

  return hex.length === 8 ? { ...rgb, a: channel(6) } : rgb;
}

function hasAlpha(color: RGB | RGBA): color is RGBA {
  return 'a' in color;
}

/**
 * Resolve a color to the CSS string the canvas 2D context takes
 */
export function toCssColor(color: ColorInput): string {
  const resolved = typeof color === 'string' ? hexToColor(color) : color;
  const { r, g, b } = resolved;

  if (hasAlpha(resolved)) {
    const alpha = Math.round((resolved.a / 255) * 1000) / 1000;
    return `rgba(${r}, ${g}, ${b}, ${alpha})`;
  }
  return `rgb(${r}, ${g}, ${b})`;
}
