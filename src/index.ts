/**
 * Card render engine
 *
 * Usage:
 * ```typescript
 * import { createRenderer, createCardInstances, renderDeck } from 'card-render-engine';
 *
 * const renderer = await createRenderer();
 * const cards = createCardInstances(definitions);
 * const summary = await renderDeck(renderer, cards, { outputDir: 'output/cards' });
 * ```
 */

import { resolveRenderConfig, type RenderConfig } from './config/renderConfig';
import { CardRenderer } from './render/CardRenderer';
import { loadTokens } from './services/designTokens';
import { registerFontDirectory } from './services/fonts';
import { setLogLevel } from './services/logger';

export * from './errors';
export * from './types/cards';
export * from './models/cards';
export * from './models/deckDefinitions';
export * from './config/renderConfig';
export * from './services/designTokens';
export { registerFontDirectory } from './services/fonts';
export { createLogger, rootLogger, setLogLevel } from './services/logger';
export * from './render/primitives';
export * from './render/elements';
export * from './render/cards';
export * from './render/CardRenderer';
export * from './render/DeckRenderer';

/**
 * Build a renderer from the environment configuration: load the tokens,
 * register fonts when a font directory is set.
 */
export async function createRenderer(overrides: Partial<RenderConfig> = {}): Promise<CardRenderer> {
  const config = resolveRenderConfig(process.env, overrides);
  setLogLevel(config.logLevel);

  if (config.fontDir) {
    await registerFontDirectory(config.fontDir);
  }

  const tokens = await loadTokens(config.tokensPath);
  return new CardRenderer(tokens, {
    outputFormat: config.outputFormat,
    webpQuality: config.webpQuality,
    typography: { fontFamily: config.fontFamily },
  });
}
