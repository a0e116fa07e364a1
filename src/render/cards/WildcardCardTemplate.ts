/**
 * WildcardCardTemplate - Property wildcard
 *
 * Layout:
 * ┌─────────────────────────────┐
 * │ ▐██▐██▐██▐██▐██▐██▐██▐██▐██▌ │  ← Stripe per allowed color
 * │     PROPERTY WILD CARD      │
 * │                             │
 * │           WILD              │
 * │                             │
 * │   Use as part of any set    │
 * │          FOOTER             │
 * └─────────────────────────────┘
 */

import type { Canvas } from '@napi-rs/canvas';
import { COLOR_SET_KEYS, type WildcardCard } from '../../types/cards';
import { drawColorStripes } from '../elements';
import { BaseCardTemplate } from './BaseCardTemplate';
import { CARD_CAPTIONS } from './CardTemplateConfig';

const STRIPE_MARGIN = 30;

/** Two-color wildcards show at most this many stripes */
const MAX_PAIR_STRIPES = 2;

export class WildcardCardTemplate extends BaseCardTemplate<WildcardCard> {
  /**
   * Set colors shown in the header stripe
   */
  stripeColors(): string[] {
    const keys: readonly string[] = this.card.isMulticolor
      ? COLOR_SET_KEYS
      : this.card.allowedColors.slice(0, MAX_PAIR_STRIPES);
    return keys.map((key) => this.tokens.setColor(key));
  }

  render(): Canvas {
    const { canvas, ctx } = this.createBase();
    const { width } = this.getCardSize();

    drawColorStripes(
      ctx,
      this.stripeColors(),
      this.layout('color_stripe_header.y'),
      this.layout('color_stripe_header.height'),
      { xStart: STRIPE_MARGIN, xEnd: width - STRIPE_MARGIN },
    );

    this.drawCaption(
      ctx,
      this.card.title ? this.card.title.toUpperCase() : CARD_CAPTIONS.wildcardTitle,
      this.layout('title_bar.y'),
      this.typography.captionFontSize,
    );
    this.drawCaption(
      ctx,
      CARD_CAPTIONS.wild,
      this.layout('character_area.center_y'),
      this.typography.wildGlyphFontSize,
      this.tokens.color('global.colors.border'),
    );

    this.drawDescription(ctx, this.typography.wildcardDescriptionFontSize);

    if (this.card.value) {
      this.drawValueBadges(ctx, this.card.value, ['top_left']);
    }

    this.drawFooter(ctx);
    return canvas;
  }
}
