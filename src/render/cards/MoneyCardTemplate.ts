/**
 * MoneyCardTemplate - Money card
 *
 * Layout:
 * ┌─────────────────────────────┐
 * │ ░░░░░░░░░░░░░░░░░░░░░░░░░░░ │
 * │ (V)                         │
 * │          ╭───────╮          │
 * │         │  $5M   │          │  ← Denomination
 * │          ╰───────╯          │
 * │                         (V) │
 * │          FOOTER             │
 * └─────────────────────────────┘
 *
 * Both corner badges always show the denomination.
 */

import type { Canvas } from '@napi-rs/canvas';
import type { MoneyCard } from '../../types/cards';
import { formatMillions } from '../elements';
import { drawCircle, drawText } from '../primitives';
import { BaseCardTemplate } from './BaseCardTemplate';
import { OUTLINE_COLOR } from './CardTemplateConfig';

export class MoneyCardTemplate extends BaseCardTemplate<MoneyCard> {
  render(): Canvas {
    const { canvas, ctx } = this.createBase();
    const { denomination } = this.card;
    const center = { x: this.centerX, y: this.layout('denomination_circle.center_y') };

    this.drawBorder(ctx);

    drawCircle(ctx, center, Math.floor(this.layout('denomination_circle.diameter') / 2), {
      fill: this.variantColor('circle_bg'),
      outline: OUTLINE_COLOR,
      width: this.layout('denomination_circle.border_width'),
    });
    drawText(
      ctx,
      formatMillions(denomination),
      center,
      this.font(this.typography.denominationFontSize, true),
      this.tokens.color('global.colors.text'),
      'mm',
    );

    this.drawValueBadges(ctx, denomination, ['top_left', 'bottom_right']);
    this.drawFooter(ctx);
    return canvas;
  }
}
