/**
 * RentCardTemplate - Rent card
 *
 * Two-color rent cards show the first color as an outer disc and the
 * second as an inner disc. Wild rent cards fan every color set around
 * the disc as equal pie slices with "ALL COLORS" in the middle.
 */

import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import { COLOR_SET_KEYS, type RentCard } from '../../types/cards';
import { drawCircle, drawPieSlice, drawText, type Point } from '../primitives';
import { BaseCardTemplate } from './BaseCardTemplate';
import { CARD_CAPTIONS, OUTLINE_COLOR, RENT_FALLBACK_COLORS } from './CardTemplateConfig';

const WILD_LABEL_OFFSET = 15;

export class RentCardTemplate extends BaseCardTemplate<RentCard> {
  render(): Canvas {
    const { canvas, ctx } = this.createBase();

    this.drawBorder(ctx);
    this.drawCaption(
      ctx,
      CARD_CAPTIONS.rent,
      this.layout('title_bar.y'),
      this.typography.rentTitleFontSize,
    );

    if (this.card.isWild) {
      this.drawWildDisc(ctx);
    } else {
      this.drawColorDiscs(ctx);
    }

    this.drawDescription(ctx, this.typography.descriptionFontSize);

    if (this.card.value) {
      this.drawValueBadges(ctx, this.card.value, ['top_left', 'bottom_right']);
    }

    this.drawFooter(ctx);
    return canvas;
  }

  private get discCenter(): Point {
    return { x: this.centerX, y: this.layout('color_circles.center_y') };
  }

  private get outerRadius(): number {
    return Math.floor(this.layout('color_circles.outer_diameter') / 2);
  }

  private get innerRadius(): number {
    return Math.floor(this.layout('color_circles.inner_diameter') / 2);
  }

  private drawColorDiscs(ctx: SKRSContext2D): void {
    const [outer, inner] = this.card.colors;
    if (outer === undefined) return;

    drawCircle(ctx, this.discCenter, this.outerRadius, {
      fill: this.tokens.setColor(outer, RENT_FALLBACK_COLORS.outer),
      outline: OUTLINE_COLOR,
      width: 4,
    });

    if (inner !== undefined) {
      drawCircle(ctx, this.discCenter, this.innerRadius, {
        fill: this.tokens.setColor(inner, RENT_FALLBACK_COLORS.inner),
        outline: OUTLINE_COLOR,
        width: 3,
      });
    }
  }

  private drawWildDisc(ctx: SKRSContext2D): void {
    const center = this.discCenter;
    const segment = 360 / COLOR_SET_KEYS.length;

    drawCircle(ctx, center, this.outerRadius, { outline: OUTLINE_COLOR, width: 4 });

    COLOR_SET_KEYS.forEach((key, index) => {
      drawPieSlice(ctx, center, this.outerRadius, index * segment, (index + 1) * segment, {
        fill: this.tokens.setColor(key),
        outline: OUTLINE_COLOR,
        width: 2,
      });
    });

    drawCircle(ctx, center, this.innerRadius, {
      fill: '#FFFFFF',
      outline: OUTLINE_COLOR,
      width: 3,
    });

    const color = this.tokens.color('global.colors.text');
    drawText(
      ctx,
      CARD_CAPTIONS.allColors,
      { x: center.x, y: center.y - WILD_LABEL_OFFSET },
      this.font(this.typography.allColorsFontSize, true),
      color,
      'mm',
    );
    drawText(
      ctx,
      CARD_CAPTIONS.colors,
      { x: center.x, y: center.y + WILD_LABEL_OFFSET },
      this.font(this.typography.colorsFontSize, true),
      color,
      'mm',
    );
  }
}
