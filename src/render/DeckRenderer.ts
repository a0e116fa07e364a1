/**
 * DeckRenderer - Batch rendering of a deck into an output directory
 *
 * Cards render one at a time to `<outputDir>/<id>.<ext>`. A failing card
 * is logged and recorded; the batch moves on. An aborted signal stops the
 * batch before the next card.
 */

import path from 'path';
import type { OutputFormat } from '../config/renderConfig';
import { createLogger } from '../services/logger';
import { CARD_TYPES, type Card, type CardType } from '../types/cards';
import type { CardRenderer } from './CardRenderer';

const logger = createLogger('DeckRenderer');

export interface DeckRenderOptions {
  outputDir: string;
  /** Defaults to the renderer's format */
  format?: OutputFormat;
  /** Render only these variants */
  types?: readonly CardType[];
  signal?: AbortSignal;
}

export interface DeckRenderFailure {
  cardId: string;
  cardType: CardType;
  error: Error;
}

export interface DeckRenderSummary {
  outputDir: string;
  /** Cards written, per variant */
  rendered: Record<CardType, number>;
  total: number;
  failures: DeckRenderFailure[];
  cancelled: boolean;
}

function emptyCounts(): Record<CardType, number> {
  return { property: 0, action: 0, money: 0, rent: 0, wildcard: 0 };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function renderDeck(
  renderer: CardRenderer,
  cards: readonly Card[],
  options: DeckRenderOptions,
): Promise<DeckRenderSummary> {
  const { outputDir, signal } = options;
  const format = options.format ?? renderer.outputFormat;
  const types = options.types ?? CARD_TYPES;

  const summary: DeckRenderSummary = {
    outputDir,
    rendered: emptyCounts(),
    total: 0,
    failures: [],
    cancelled: false,
  };

  for (const type of types) {
    const batch = cards.filter((card) => card.type === type);
    if (batch.length === 0) continue;

    logger.info(`Rendering ${batch.length} ${type} cards...`);

    for (const card of batch) {
      if (signal?.aborted) {
        summary.cancelled = true;
        logger.warn(`Deck render cancelled after ${summary.total} cards`);
        return summary;
      }

      const outputPath = path.join(outputDir, `${card.id}.${format}`);
      try {
        await renderer.renderToFile(card, outputPath, format);
        summary.rendered[type] += 1;
        summary.total += 1;
      } catch (caught) {
        const error = toError(caught);
        logger.error(`Failed to render ${card.id}: ${error.message}`);
        summary.failures.push({ cardId: card.id, cardType: type, error });
      }
    }
  }

  logger.info(`Rendered ${summary.total} cards to ${outputDir}`, {
    failures: summary.failures.length,
  });
  return summary;
}
