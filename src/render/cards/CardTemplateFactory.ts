/**
 * CardTemplateFactory - Factory for creating card templates
 *
 * Dispatches on the card's variant tag. Every variant has a template;
 * a tag outside the closed set fails with `UnsupportedCardTypeError`.
 *
 * Usage:
 * ```typescript
 * const factory = new CardTemplateFactory(tokens, { typography: { fontFamily: 'Inter' } });
 * const canvas = factory.createTemplate(card).render();
 * ```
 */

import { UnsupportedCardTypeError } from '../../errors';
import type { DesignTokens } from '../../services/designTokens';
import type { Card } from '../../types/cards';
import { ActionCardTemplate } from './ActionCardTemplate';
import type { BaseCardTemplate } from './BaseCardTemplate';
import type { TypographyConfig } from './CardTemplateConfig';
import { MoneyCardTemplate } from './MoneyCardTemplate';
import { PropertyCardTemplate } from './PropertyCardTemplate';
import { RentCardTemplate } from './RentCardTemplate';
import { WildcardCardTemplate } from './WildcardCardTemplate';

export type CardTemplate = BaseCardTemplate<Card>;

/**
 * Factory configuration
 */
export interface CardTemplateFactoryConfig {
  /** Typography overrides applied to every template */
  typography: Partial<TypographyConfig>;
}

const DEFAULT_FACTORY_CONFIG: CardTemplateFactoryConfig = {
  typography: {},
};

function describeTag(card: unknown): string {
  if (typeof card === 'object' && card !== null && 'type' in card) {
    return String(card.type);
  }
  return String(card);
}

/**
 * Factory for creating card templates
 */
export class CardTemplateFactory {
  private readonly tokens: DesignTokens;
  private readonly config: CardTemplateFactoryConfig;

  constructor(tokens: DesignTokens, config: Partial<CardTemplateFactoryConfig> = {}) {
    this.tokens = tokens;
    this.config = { ...DEFAULT_FACTORY_CONFIG, ...config };
  }

  /**
   * Create the template for a card's variant
   */
  createTemplate(card: Card): CardTemplate {
    const { typography } = this.config;

    switch (card.type) {
      case 'property':
        return new PropertyCardTemplate(card, this.tokens, typography);

      case 'action':
        return new ActionCardTemplate(card, this.tokens, typography);

      case 'money':
        return new MoneyCardTemplate(card, this.tokens, typography);

      case 'rent':
        return new RentCardTemplate(card, this.tokens, typography);

      case 'wildcard':
        return new WildcardCardTemplate(card, this.tokens, typography);

      default: {
        const unknownCard: never = card;
        throw new UnsupportedCardTypeError(describeTag(unknownCard));
      }
    }
  }

  /**
   * Create a new factory with updated configuration
   */
  withConfig(config: Partial<CardTemplateFactoryConfig>): CardTemplateFactory {
    return new CardTemplateFactory(this.tokens, { ...this.config, ...config });
  }
}
