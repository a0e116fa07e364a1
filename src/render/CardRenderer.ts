/**
 * CardRenderer - Renders cards to canvases and image files
 *
 * Responsibilities:
 * - Delegates drawing to the variant templates through `CardTemplateFactory`
 * - Encodes to PNG (lossless) or WebP (lossy)
 * - Writes image files atomically: encode, write a temp file, rename
 */

import type { Canvas } from '@napi-rs/canvas';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { DEFAULT_RENDER_CONFIG, isOutputFormat, type OutputFormat } from '../config/renderConfig';
import { ImageEncodeError } from '../errors';
import type { DesignTokens } from '../services/designTokens';
import { createLogger } from '../services/logger';
import type { Card } from '../types/cards';
import { CardTemplateFactory, type TypographyConfig } from './cards';

const logger = createLogger('CardRenderer');

export interface CardRendererOptions {
  /** Format used when neither the call nor the file extension names one */
  outputFormat: OutputFormat;

  /** WebP quality, 1-100 */
  webpQuality: number;

  /** Typography overrides passed to every template */
  typography: Partial<TypographyConfig>;
}

const DEFAULT_RENDERER_OPTIONS: CardRendererOptions = {
  outputFormat: DEFAULT_RENDER_CONFIG.outputFormat,
  webpQuality: DEFAULT_RENDER_CONFIG.webpQuality,
  typography: {},
};

/**
 * Pick the output format: explicit argument, then file extension, then
 * `fallback`. An extension that is neither png nor webp is an error.
 */
export function resolveOutputFormat(
  outputPath: string,
  explicit?: OutputFormat,
  fallback: OutputFormat = DEFAULT_RENDER_CONFIG.outputFormat,
): OutputFormat {
  if (explicit) return explicit;

  const extension = path.extname(outputPath).slice(1).toLowerCase();
  if (!extension) return fallback;
  if (isOutputFormat(extension)) return extension;

  throw new ImageEncodeError(outputPath, `unsupported image format ".${extension}"`);
}

export function encodeCanvas(
  canvas: Canvas,
  format: OutputFormat,
  webpQuality: number = DEFAULT_RENDER_CONFIG.webpQuality,
): Promise<Buffer> {
  return format === 'webp' ? canvas.encode('webp', webpQuality) : canvas.encode('png');
}

export class CardRenderer {
  private readonly factory: CardTemplateFactory;
  private readonly options: CardRendererOptions;

  constructor(tokens: DesignTokens, options: Partial<CardRendererOptions> = {}) {
    this.options = { ...DEFAULT_RENDERER_OPTIONS, ...options };
    this.factory = new CardTemplateFactory(tokens, { typography: this.options.typography });
  }

  get outputFormat(): OutputFormat {
    return this.options.outputFormat;
  }

  /**
   * Render a card onto a new canvas
   */
  render(card: Card): Canvas {
    return this.factory.createTemplate(card).render();
  }

  /**
   * Render a card and write it to `outputPath`. Nothing is written when
   * rendering or encoding fails.
   */
  async renderToFile(card: Card, outputPath: string, format?: OutputFormat): Promise<Canvas> {
    const resolvedFormat = resolveOutputFormat(outputPath, format, this.options.outputFormat);
    const canvas = this.render(card);

    let data: Buffer;
    try {
      data = await encodeCanvas(canvas, resolvedFormat, this.options.webpQuality);
    } catch (error) {
      throw new ImageEncodeError(outputPath, `${resolvedFormat} encoding failed`, error);
    }

    await writeAtomically(outputPath, data);
    logger.debug(`Rendered ${card.id} to ${outputPath}`);
    return canvas;
  }
}

async function writeAtomically(outputPath: string, data: Buffer): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });

  const tempPath = `${outputPath}.${process.pid}.tmp`;
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Render a card, and write it when `outputPath` is given
 */
export async function renderCard(
  card: Card,
  tokens: DesignTokens,
  outputPath?: string,
  options: Partial<CardRendererOptions> = {},
): Promise<Canvas> {
  const renderer = new CardRenderer(tokens, options);
  return outputPath ? renderer.renderToFile(card, outputPath) : renderer.render(card);
}
