export {
  drawValueBadge,
  formatMillions,
  DEFAULT_BADGE_DIAMETER,
  DEFAULT_VALUE_BADGE_STYLE,
  type ValueBadgeStyle,
} from './ValueBadge';
export {
  drawDecorativeBorder,
  parseBorderPattern,
  BORDER_PATTERNS,
  DEFAULT_BORDER_OPTIONS,
  type BorderPattern,
  type DecorativeBorderOptions,
} from './DecorativeBorder';
export { drawPropertyRentRow, DEFAULT_RENT_ROW_LAYOUT, type RentRowLayout } from './PropertyRentRow';
export { drawColorStripes, DEFAULT_STRIPE_SPAN, type StripeSpan } from './ColorStripes';
