/**
 * Error taxonomy for the card render engine.
 *
 * Every failure is raised where it happens and travels up to the caller of
 * the renderer unchanged. Only the deck renderer catches, and only per card.
 */

/**
 * Base class for all engine errors
 */
export abstract class CardRenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Hex color string with a length other than 6 or 8 digits, or non-hex digits
 */
export class InvalidColorFormatError extends CardRenderError {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid hex color: "${value}"`);
    this.value = value;
  }
}

/**
 * Required design token path is absent from the token tree
 */
export class MissingTokenKeyError extends CardRenderError {
  readonly path: string;

  constructor(path: string) {
    super(`Missing design token: ${path}`);
    this.path = path;
  }
}

/**
 * Design token exists but holds the wrong kind of value
 */
export class InvalidTokenValueError extends CardRenderError {
  readonly path: string;
  readonly value: unknown;

  constructor(path: string, value: unknown, expected: string) {
    super(`Invalid design token ${path}: expected ${expected}, got ${JSON.stringify(value)}`);
    this.path = path;
    this.value = value;
  }
}

/**
 * Token document could not be read or parsed
 */
export class TokenLoadError extends CardRenderError {
  readonly source: string;

  constructor(source: string, reason: string, cause?: unknown) {
    super(`Failed to load design tokens from ${source}: ${reason}`, { cause });
    this.source = source;
  }
}

/**
 * Card variant tag outside the closed set
 */
export class UnsupportedCardTypeError extends CardRenderError {
  readonly cardType: string;

  constructor(cardType: string) {
    super(`Unsupported card type: ${cardType}`);
    this.cardType = cardType;
  }
}

/**
 * Variant-specific required field missing or invalid at construction time
 */
export class CardConstructionError extends CardRenderError {
  readonly field: string;

  constructor(cardType: string, field: string, reason: string) {
    super(`Cannot construct ${cardType} card: ${field} ${reason}`);
    this.field = field;
  }
}

export class ImageEncodeError extends CardRenderError {
  readonly outputPath: string;

  constructor(outputPath: string, reason: string, cause?: unknown) {
    super(`Failed to encode ${outputPath}: ${reason}`, { cause });
    this.outputPath = outputPath;
  }
}

export class ConfigError extends CardRenderError {
  readonly variable: string;

  constructor(variable: string, reason: string) {
    super(`Invalid configuration ${variable}: ${reason}`);
    this.variable = variable;
  }
}
