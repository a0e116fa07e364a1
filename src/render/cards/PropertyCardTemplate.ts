/**
 * PropertyCardTemplate - Property card with rent table
 *
 * Layout:
 * ┌─────────────────────────────┐
 * │ ┌─────────────────────────┐ │
 * │ │ (V)   PROPERTY NAME     │ │  ← Header bar in set color
 * │ └─────────────────────────┘ │
 * │            RENT             │
 * │     (No. of properties      │
 * │       owned in set)         │
 * │  [⌂1] · · · · · · · · $1M   │  ← One row per rent tier
 * │  [⌂2] · · · · · · · · $2M   │
 * │  [⌂3] · · · · · · · · $4M   │
 * │                             │
 * │          FOOTER             │
 * └─────────────────────────────┘
 */

import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import type { PropertyCard } from '../../types/cards';
import { drawPropertyRentRow } from '../elements';
import { drawMultilineText, drawRoundedRect, drawText } from '../primitives';
import { BaseCardTemplate } from './BaseCardTemplate';
import { CARD_CAPTIONS, OUTLINE_COLOR } from './CardTemplateConfig';

const HEADER_RADIUS = 10;
const RENT_TABLE_MARGIN = 30;
const RENT_LABEL_OFFSET = 65;
const RENT_CAPTION_OFFSET = 45;

export class PropertyCardTemplate extends BaseCardTemplate<PropertyCard> {
  render(): Canvas {
    const { canvas, ctx } = this.createBase();
    const headerColor = this.tokens.setColor(this.card.color);

    this.drawHeader(ctx, headerColor);
    this.drawRentTable(ctx, headerColor);

    if (this.card.value) {
      this.drawValueBadges(ctx, this.card.value, ['top_left']);
    }

    this.drawFooter(ctx);
    return canvas;
  }

  private drawHeader(ctx: SKRSContext2D, headerColor: string): void {
    const { width } = this.getCardSize();
    const padding = this.layout('header_bar.padding');
    const height = this.layout('header_bar.height');

    drawRoundedRect(
      ctx,
      { x1: padding, y1: padding, x2: width - padding, y2: height },
      HEADER_RADIUS,
      { fill: headerColor, outline: OUTLINE_COLOR, width: 2 },
    );

    drawText(
      ctx,
      this.card.propertyName.toUpperCase(),
      { x: this.centerX, y: padding + Math.floor(height / 2) },
      this.font(this.typography.headerFontSize, true),
      this.tokens.color('global.colors.text'),
      'mm',
    );
  }

  private drawRentTable(ctx: SKRSContext2D, iconColor: string): void {
    const { width } = this.getCardSize();
    const startY = this.layout('rent_section.start_y');
    const rowHeight = this.layout('rent_section.row_height');
    const rowWidth = width - RENT_TABLE_MARGIN * 2;

    this.drawCaption(
      ctx,
      CARD_CAPTIONS.rentLabel,
      startY - RENT_LABEL_OFFSET,
      this.typography.rentLabelFontSize,
    );

    drawMultilineText(
      ctx,
      CARD_CAPTIONS.rentTableCaption,
      { x: RENT_TABLE_MARGIN, y: startY - RENT_CAPTION_OFFSET },
      this.font(this.typography.rentCaptionFontSize),
      {
        color: this.tokens.color('global.colors.text'),
        maxWidth: rowWidth,
        lineSpacing: 1.1,
        align: 'center',
      },
    );

    this.card.rentValues.forEach((tier, index) => {
      drawPropertyRentRow(ctx, startY + index * rowHeight, tier.propertiesOwned, tier.rent, iconColor, {
        xStart: RENT_TABLE_MARGIN,
        rowWidth,
        fontFamily: this.typography.fontFamily,
      });
    });
  }
}
