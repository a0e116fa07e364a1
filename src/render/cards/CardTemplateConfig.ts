/**
 * Card Template Configuration
 *
 * Typography and fixed captions shared by the card templates. Layout
 * coordinates and colors live in the design tokens; what stays here is
 * what does not vary per deck.
 */

import { DEFAULT_RENDER_CONFIG } from '../../config/renderConfig';

/**
 * Typography configuration
 */
export interface TypographyConfig {
  /** Font family */
  fontFamily: string;

  /** Property header name */
  headerFontSize: number;

  /** "RENT" label above the rent table */
  rentLabelFontSize: number;

  /** Caption under the "RENT" label */
  rentCaptionFontSize: number;

  /** "ACTION CARD" and wildcard title captions */
  captionFontSize: number;

  /** "RENT" title on rent cards */
  rentTitleFontSize: number;

  /** Action name inside the title circle */
  actionNameFontSize: number;

  /** Denomination inside the money circle */
  denominationFontSize: number;

  /** Action and rent descriptions */
  descriptionFontSize: number;

  /** Wildcard description */
  wildcardDescriptionFontSize: number;

  /** "WILD" glyph */
  wildGlyphFontSize: number;

  /** "ALL" on wild rent cards */
  allColorsFontSize: number;

  /** "COLORS" on wild rent cards */
  colorsFontSize: number;

  /** Footer line */
  footerFontSize: number;
}

/**
 * Default typography configuration
 */
export const DEFAULT_TYPOGRAPHY: TypographyConfig = {
  fontFamily: DEFAULT_RENDER_CONFIG.fontFamily,
  headerFontSize: 18,
  rentLabelFontSize: 24,
  rentCaptionFontSize: 12,
  captionFontSize: 16,
  rentTitleFontSize: 20,
  actionNameFontSize: 28,
  denominationFontSize: 60,
  descriptionFontSize: 12,
  wildcardDescriptionFontSize: 11,
  wildGlyphFontSize: 64,
  allColorsFontSize: 42,
  colorsFontSize: 20,
  footerFontSize: 10,
};

export const CARD_CAPTIONS = {
  action: 'ACTION CARD',
  rent: 'RENT',
  rentLabel: 'RENT',
  rentTableCaption: '(No. of properties\nowned in set)',
  wildcardTitle: 'PROPERTY WILD CARD',
  wild: 'WILD',
  allColors: 'ALL',
  colors: 'COLORS',
} as const;

/** Action names longer than this are split over two lines */
export const ACTION_NAME_SPLIT_THRESHOLD = 12;

/** Fill colors for rent discs whose color-set key is unknown */
export const RENT_FALLBACK_COLORS = {
  outer: '#228B22',
  inner: '#FF1493',
} as const;

export const OUTLINE_COLOR = '#000000';
