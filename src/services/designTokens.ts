/**
 * Design Tokens
 *
 * Read-only tree of layout geometry and colors with two sections:
 * `global` (card size, badge geometry, color sets) and `card_types`
 * (per-variant backgrounds and coordinates).
 *
 * `DesignTokens` is the immutable, typed view over a loaded tree. Lookups
 * take dotted paths (`global.card.width`) and fail with
 * `MissingTokenKeyError` instead of defaulting, except color-set lookups
 * which fall back to a default color for unknown set names.
 *
 * `DesignTokenStore` loads the document once per store. Concurrent first
 * callers share the same read.
 */

import { readFile } from 'fs/promises';
import {
  InvalidTokenValueError,
  MissingTokenKeyError,
  TokenLoadError,
} from '../errors';
import { hexToColor } from '../render/primitives/color';
import type { Point } from '../render/primitives/shapes';
import { DEFAULT_RENDER_CONFIG } from '../config/renderConfig';
import { createLogger } from './logger';

const logger = createLogger('DesignTokens');

export type TokenValue = string | number | boolean | null | TokenNode | readonly TokenValue[];

export interface TokenNode {
  readonly [key: string]: TokenValue;
}

/** Color used for color-set keys missing from `global.colors.property_sets` */
export const DEFAULT_SET_COLOR = '#228B22';

const PROPERTY_SETS_PATH = 'global.colors.property_sets';

export function isTokenNode(value: TokenValue): value is TokenNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy parsed JSON into a frozen token tree
 */
function toTokenValue(value: unknown, path: string): TokenValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item, index) => toTokenValue(item, `${path}[${index}]`)));
  }
  if (isPlainObject(value)) {
    const node: Record<string, TokenValue> = {};
    for (const [key, child] of Object.entries(value)) {
      node[key] = toTokenValue(child, path ? `${path}.${key}` : key);
    }
    return Object.freeze(node);
  }
  throw new InvalidTokenValueError(path, String(value), 'a JSON value');
}

export class DesignTokens {
  private readonly tree: TokenNode;

  private constructor(tree: TokenNode) {
    this.tree = tree;
  }

  /**
   * Build from an in-memory object (parsed JSON or a test fixture)
   */
  static fromObject(value: unknown, source: string = '<memory>'): DesignTokens {
    if (!isPlainObject(value)) {
      throw new TokenLoadError(source, 'document root must be an object');
    }

    const tree = toTokenValue(value, '');
    if (!isTokenNode(tree)) {
      throw new TokenLoadError(source, 'document root must be an object');
    }
    for (const section of ['global', 'card_types']) {
      const node = tree[section];
      if (node === undefined || !isTokenNode(node)) {
        throw new TokenLoadError(source, `missing "${section}" section`);
      }
    }
    return new DesignTokens(tree);
  }

  /**
   * The raw tree (deeply frozen)
   */
  get root(): TokenNode {
    return this.tree;
  }

  private lookup(path: string): TokenValue | undefined {
    let node: TokenValue = this.tree;
    for (const segment of path.split('.')) {
      if (!isTokenNode(node)) return undefined;
      const child: TokenValue | undefined = node[segment];
      if (child === undefined) return undefined;
      node = child;
    }
    return node;
  }

  has(path: string): boolean {
    return this.lookup(path) !== undefined;
  }

  get(path: string): TokenValue {
    const value = this.lookup(path);
    if (value === undefined) {
      throw new MissingTokenKeyError(path);
    }
    return value;
  }

  number(path: string): number {
    const value = this.get(path);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidTokenValueError(path, value, 'a number');
    }
    return value;
  }

  string(path: string): string {
    const value = this.get(path);
    if (typeof value !== 'string') {
      throw new InvalidTokenValueError(path, value, 'a string');
    }
    return value;
  }

  /**
   * Hex color token, validated
   */
  color(path: string): string {
    const value = this.string(path);
    hexToColor(value);
    return value;
  }

  point(path: string): Point {
    return { x: this.number(`${path}.x`), y: this.number(`${path}.y`) };
  }

  /**
   * Display color of a color-set key. Unknown keys get `fallback`; the
   * color-set table itself is required.
   */
  setColor(key: string, fallback: string = DEFAULT_SET_COLOR): string {
    const sets = this.get(PROPERTY_SETS_PATH);
    if (!isTokenNode(sets)) {
      throw new InvalidTokenValueError(PROPERTY_SETS_PATH, sets, 'a color-set table');
    }

    const color = Object.prototype.hasOwnProperty.call(sets, key) ? sets[key] : undefined;
    if (color === undefined) {
      return fallback;
    }
    if (typeof color !== 'string') {
      throw new InvalidTokenValueError(`${PROPERTY_SETS_PATH}.${key}`, color, 'a hex color');
    }
    return color;
  }
}

export type TokenReader = (path: string) => Promise<string>;

const readUtf8: TokenReader = (path) => readFile(path, 'utf8');

/**
 * Lazily loads and caches one token document
 */
export class DesignTokenStore {
  private tokens: DesignTokens | null = null;
  private loadPromise: Promise<DesignTokens> | null = null;
  private readonly path: string;
  private readonly reader: TokenReader;

  constructor(path: string = DEFAULT_RENDER_CONFIG.tokensPath, reader: TokenReader = readUtf8) {
    this.path = path;
    this.reader = reader;
  }

  /**
   * Load the tokens, reading the document at most once
   */
  async load(): Promise<DesignTokens> {
    if (this.tokens) return this.tokens;
    if (this.loadPromise) return this.loadPromise;

    this.loadPromise = this.readTokens().then(
      (tokens) => {
        this.tokens = tokens;
        return tokens;
      },
      (error: unknown) => {
        // Failed loads are not cached
        this.loadPromise = null;
        throw error;
      },
    );

    return this.loadPromise;
  }

  private async readTokens(): Promise<DesignTokens> {
    let text: string;
    try {
      text = await this.reader(this.path);
    } catch (error) {
      throw new TokenLoadError(this.path, 'file could not be read', error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new TokenLoadError(this.path, 'invalid JSON', error);
    }

    const tokens = DesignTokens.fromObject(parsed, this.path);
    logger.debug(`Loaded design tokens from ${this.path}`);
    return tokens;
  }
}

const stores = new Map<string, DesignTokenStore>();

/**
 * Load design tokens through a process-wide store per path
 */
export function loadTokens(path: string = DEFAULT_RENDER_CONFIG.tokensPath): Promise<DesignTokens> {
  let store = stores.get(path);
  if (!store) {
    store = new DesignTokenStore(path);
    stores.set(path, store);
  }
  return store.load();
}
