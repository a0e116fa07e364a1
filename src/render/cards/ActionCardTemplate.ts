/**
 * ActionCardTemplate - Action card
 *
 * Layout:
 * ┌─────────────────────────────┐
 * │ ░░░░░░░░░░░░░░░░░░░░░░░░░░░ │  ← Decorative border
 * │ (V)      ACTION CARD        │
 * │          ╭───────╮          │
 * │         │  DEAL   │         │  ← Action name, split over two
 * │         │ BREAKER │         │    lines when it is long
 * │          ╰───────╯          │
 * │     Steal a complete set    │  ← Description
 * │                         (V) │
 * │          FOOTER             │
 * └─────────────────────────────┘
 */

import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import type { ActionCard } from '../../types/cards';
import { drawCircle, drawText } from '../primitives';
import { BaseCardTemplate } from './BaseCardTemplate';
import {
  ACTION_NAME_SPLIT_THRESHOLD,
  CARD_CAPTIONS,
  OUTLINE_COLOR,
} from './CardTemplateConfig';

const SPLIT_LINE_OFFSET = 20;

/**
 * Split a long action name at its word midpoint. Names at or under the
 * threshold stay on one line.
 */
export function splitActionName(
  name: string,
  threshold: number = ACTION_NAME_SPLIT_THRESHOLD,
): string[] {
  const words = name.split(/\s+/).filter(Boolean);
  // A single long word is kept whole on purpose, never split into an empty first line
  if (name.length <= threshold || words.length < 2) {
    return [name];
  }

  const middle = Math.floor(words.length / 2);
  return [words.slice(0, middle).join(' '), words.slice(middle).join(' ')];
}

export class ActionCardTemplate extends BaseCardTemplate<ActionCard> {
  render(): Canvas {
    const { canvas, ctx } = this.createBase();

    this.drawBorder(ctx);
    this.drawCaption(
      ctx,
      CARD_CAPTIONS.action,
      this.layout('title_bar.y'),
      this.typography.captionFontSize,
    );
    this.drawTitleCircle(ctx);
    this.drawDescription(ctx, this.typography.descriptionFontSize);

    if (this.card.value) {
      this.drawValueBadges(ctx, this.card.value, ['top_left', 'bottom_right']);
    }

    this.drawFooter(ctx);
    return canvas;
  }

  private drawTitleCircle(ctx: SKRSContext2D): void {
    const center = { x: this.centerX, y: this.layout('title_circle.center_y') };

    drawCircle(ctx, center, Math.floor(this.layout('title_circle.diameter') / 2), {
      fill: this.variantColor('circle_bg'),
      outline: OUTLINE_COLOR,
      width: this.layout('title_circle.border_width'),
    });

    const lines = splitActionName(this.card.actionName);
    const font = this.font(this.typography.actionNameFontSize, true);
    const color = this.tokens.color('global.colors.text');

    if (lines.length === 1) {
      drawText(ctx, lines[0].toUpperCase(), center, font, color, 'mm');
      return;
    }

    lines.forEach((line, index) => {
      const y = center.y + (index === 0 ? -SPLIT_LINE_OFFSET : SPLIT_LINE_OFFSET);
      drawText(ctx, line.toUpperCase(), { x: center.x, y }, font, color, 'mm');
    });
  }
}
