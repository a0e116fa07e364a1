/**
 * Render Configuration
 *
 * Process-level settings for the renderer: where the design tokens live,
 * the default output encoding, typography and logging. Values come from
 * the defaults below, then the environment, then explicit overrides.
 */

import path from 'path';
import { ConfigError } from '../errors';

export const OUTPUT_FORMATS = ['png', 'webp'] as const;

/** `png` is lossless, `webp` is the lossy alternative */
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RenderConfig {
  /** Path to the design token document */
  tokensPath: string;

  /** Default encoding for rendered cards */
  outputFormat: OutputFormat;

  /** WebP quality, 1-100 */
  webpQuality: number;

  /** CSS font family used by every template */
  fontFamily: string;

  /** Directory of font files to register before rendering */
  fontDir?: string;

  logLevel: LogLevel;
}

export const DEFAULT_TOKENS_PATH = path.join(__dirname, '..', '..', 'design-tokens.json');

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  tokensPath: DEFAULT_TOKENS_PATH,
  outputFormat: 'png',
  webpQuality: 90,
  fontFamily: 'Arial, sans-serif',
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

function oneOf<T extends string>(
  values: readonly T[],
  variable: string,
  raw: string,
): T {
  const match = values.find((value) => value === raw.trim().toLowerCase());
  if (match === undefined) {
    throw new ConfigError(variable, `expected one of ${values.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function resolveLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL;
  return raw ? oneOf(LOG_LEVELS, 'LOG_LEVEL', raw) : DEFAULT_RENDER_CONFIG.logLevel;
}

function parseQuality(raw: string): number {
  const quality = Number(raw);
  if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
    throw new ConfigError('CARD_WEBP_QUALITY', `expected an integer between 1 and 100, got "${raw}"`);
  }
  return quality;
}

/**
 * Build the render configuration from defaults, environment and overrides
 */
export function resolveRenderConfig(
  env: Env = process.env,
  overrides: Partial<RenderConfig> = {},
): RenderConfig {
  const fromEnv: Partial<RenderConfig> = {};

  if (env.CARD_TOKENS_PATH) {
    fromEnv.tokensPath = path.resolve(env.CARD_TOKENS_PATH);
  }
  if (env.CARD_OUTPUT_FORMAT) {
    fromEnv.outputFormat = oneOf(OUTPUT_FORMATS, 'CARD_OUTPUT_FORMAT', env.CARD_OUTPUT_FORMAT);
  }
  if (env.CARD_WEBP_QUALITY) {
    fromEnv.webpQuality = parseQuality(env.CARD_WEBP_QUALITY);
  }
  if (env.CARD_FONT_FAMILY) {
    fromEnv.fontFamily = env.CARD_FONT_FAMILY;
  }
  if (env.CARD_FONT_DIR) {
    fromEnv.fontDir = path.resolve(env.CARD_FONT_DIR);
  }
  if (env.LOG_LEVEL) {
    fromEnv.logLevel = resolveLogLevel(env);
  }

  return { ...DEFAULT_RENDER_CONFIG, ...fromEnv, ...overrides };
}
