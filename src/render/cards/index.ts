/**
 * Card Templates Module
 *
 * One template per card variant, each drawing a complete card from the
 * design tokens onto its own canvas.
 *
 * Class Hierarchy:
 * ```
 * BaseCardTemplate (abstract)
 * ├── PropertyCardTemplate  - Set-colored header + rent table
 * ├── ActionCardTemplate    - Bordered card, title circle + description
 * ├── MoneyCardTemplate     - Bordered card, denomination circle
 * ├── RentCardTemplate      - Two-color discs or the wild color fan
 * └── WildcardCardTemplate  - Color stripe header + WILD glyph
 * ```
 *
 * Usage:
 * ```typescript
 * import { CardTemplateFactory } from './cards';
 *
 * const factory = new CardTemplateFactory(tokens);
 * const canvas = factory.createTemplate(card).render();
 * ```
 */

// Configuration
export {
  type TypographyConfig,
  DEFAULT_TYPOGRAPHY,
  CARD_CAPTIONS,
  ACTION_NAME_SPLIT_THRESHOLD,
  RENT_FALLBACK_COLORS,
} from './CardTemplateConfig';

// Base class
export { BaseCardTemplate, type BadgeCorner, type CardSize } from './BaseCardTemplate';

// Concrete templates
export { PropertyCardTemplate } from './PropertyCardTemplate';
export { ActionCardTemplate, splitActionName } from './ActionCardTemplate';
export { MoneyCardTemplate } from './MoneyCardTemplate';
export { RentCardTemplate } from './RentCardTemplate';
export { WildcardCardTemplate } from './WildcardCardTemplate';

// Factory
export {
  CardTemplateFactory,
  type CardTemplate,
  type CardTemplateFactoryConfig,
} from './CardTemplateFactory';
