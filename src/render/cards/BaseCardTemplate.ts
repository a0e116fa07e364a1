/**
 * BaseCardTemplate - Abstract base class for all card templates
 *
 * Provides common functionality for:
 * - Canvas allocation at the canonical card size
 * - Variant-scoped token lookups (`card_types.<variant>.layout.*`)
 * - Decorative border, centered captions and wrapped descriptions
 * - Corner value badges and the footer line
 *
 * All concrete templates must extend this class. A template reads only
 * the tokens it was given and draws onto a canvas it allocates itself.
 */

import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import type { DesignTokens } from '../../services/designTokens';
import type { Card } from '../../types/cards';
import { drawDecorativeBorder, drawValueBadge, parseBorderPattern } from '../elements';
import {
  createCardCanvas,
  drawMultilineText,
  drawText,
  type FontSpec,
  type Point,
} from '../primitives';
import { DEFAULT_TYPOGRAPHY, type TypographyConfig } from './CardTemplateConfig';

export type BadgeCorner = 'top_left' | 'bottom_right';

export interface CardSize {
  width: number;
  height: number;
}

/**
 * Abstract base class for card templates
 */
export abstract class BaseCardTemplate<TCard extends Card> {
  /** Card to render */
  protected readonly card: TCard;

  /** Design tokens */
  protected readonly tokens: DesignTokens;

  /** Typography configuration */
  protected readonly typography: TypographyConfig;

  constructor(card: TCard, tokens: DesignTokens, typography: Partial<TypographyConfig> = {}) {
    this.card = card;
    this.tokens = tokens;
    this.typography = { ...DEFAULT_TYPOGRAPHY, ...typography };
  }

  /**
   * Render the card onto a new canvas - must be implemented by subclasses
   */
  abstract render(): Canvas;

  getCard(): TCard {
    return this.card;
  }

  getCardSize(): CardSize {
    return {
      width: this.tokens.number('global.card.width'),
      height: this.tokens.number('global.card.height'),
    };
  }

  protected get centerX(): number {
    return Math.floor(this.getCardSize().width / 2);
  }

  /**
   * Number under `card_types.<variant>.layout`
   */
  protected layout(path: string): number {
    return this.tokens.number(`card_types.${this.card.type}.layout.${path}`);
  }

  /**
   * Color under `card_types.<variant>.colors`
   */
  protected variantColor(name: string): string {
    return this.tokens.color(`card_types.${this.card.type}.colors.${name}`);
  }

  protected font(size: number, bold: boolean = false): FontSpec {
    return { family: this.typography.fontFamily, size, bold };
  }

  /**
   * Allocate the card canvas with the variant background
   */
  protected createBase(): { canvas: Canvas; ctx: SKRSContext2D } {
    const { width, height } = this.getCardSize();
    const canvas = createCardCanvas(
      width,
      height,
      this.variantColor('background'),
      this.tokens.number('global.card.corner_radius'),
    );
    return { canvas, ctx: canvas.getContext('2d') };
  }

  protected drawBorder(ctx: SKRSContext2D): void {
    const patternPath = `card_types.${this.card.type}.layout.border.pattern`;

    drawDecorativeBorder(ctx, this.getCardSize(), {
      pattern: parseBorderPattern(this.tokens.string(patternPath), patternPath),
      borderWidth: this.layout('border.width'),
      color: this.tokens.color('global.colors.border'),
    });
  }

  /**
   * Draw a single centered line of text
   */
  protected drawCaption(
    ctx: SKRSContext2D,
    text: string,
    y: number,
    size: number,
    color: string = this.tokens.color('global.colors.text'),
  ): void {
    drawText(ctx, text, { x: this.centerX, y }, this.font(size, true), color, 'mm');
  }

  /**
   * Draw the card description, wrapped and centered in the description area
   */
  protected drawDescription(ctx: SKRSContext2D, fontSize: number): void {
    const { description } = this.card;
    if (!description) return;

    const areaWidth = this.layout('description_area.width');
    const x = Math.floor((this.getCardSize().width - areaWidth) / 2);

    drawMultilineText(ctx, description, { x, y: this.layout('description_area.start_y') }, this.font(fontSize), {
      color: this.tokens.color('global.colors.text'),
      maxWidth: areaWidth,
      align: 'center',
    });
  }

  /**
   * Badge center for a corner. `bottom_right` is an offset from the
   * card's bottom-right corner.
   */
  protected badgePosition(corner: BadgeCorner): Point {
    const offset = this.tokens.point(`global.value_badge.position.${corner}`);
    if (corner === 'top_left') {
      return offset;
    }

    const { width, height } = this.getCardSize();
    return { x: width + offset.x, y: height + offset.y };
  }

  protected drawValueBadges(
    ctx: SKRSContext2D,
    value: number,
    corners: readonly BadgeCorner[],
  ): void {
    const diameter = this.tokens.number('global.value_badge.diameter');

    for (const corner of corners) {
      drawValueBadge(ctx, value, this.badgePosition(corner), diameter, {
        fontFamily: this.typography.fontFamily,
      });
    }
  }

  protected drawFooter(ctx: SKRSContext2D): void {
    const text = this.tokens.string('global.footer.text');
    if (!text) return;

    drawText(
      ctx,
      text,
      { x: this.centerX, y: this.layout('footer_text.y') },
      this.font(this.typography.footerFontSize),
      this.tokens.color('global.colors.footer_text'),
      'mm',
    );
  }
}
