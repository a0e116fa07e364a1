import { describe, expect, it, vi } from 'vitest';
import {
  InvalidColorFormatError,
  InvalidTokenValueError,
  MissingTokenKeyError,
  TokenLoadError,
} from '../errors';
import { catchError, testTokens, tokenDocument } from '../test/tokens';
import { DEFAULT_SET_COLOR, DesignTokenStore, DesignTokens, loadTokens } from './designTokens';

describe('DesignTokens', () => {
  it('reads typed values by dotted path', () => {
    const tokens = testTokens();

    expect(tokens.number('global.card.width')).toBe(413);
    expect(tokens.string('global.footer.text')).toBe('PROPERTY TRADING DECK');
    expect(tokens.point('global.value_badge.position.bottom_right')).toEqual({ x: -40, y: -40 });
    expect(tokens.has('card_types.rent.layout.color_circles')).toBe(true);
    expect(tokens.has('card_types.rent.layout.stripes')).toBe(false);
  });

  it('names the missing path', () => {
    const error = catchError(() => testTokens().number('global.card.depth'));

    expect(error).toBeInstanceOf(MissingTokenKeyError);
    expect(error).toHaveProperty('path', 'global.card.depth');
  });

  it('rejects values of the wrong kind', () => {
    const tokens = testTokens({ 'global.card.width': 'wide' });

    const error = catchError(() => tokens.number('global.card.width'));
    expect(error).toBeInstanceOf(InvalidTokenValueError);
    expect(error).toHaveProperty('path', 'global.card.width');
  });

  it('validates color tokens', () => {
    const tokens = testTokens({ 'global.colors.text': '#12' });

    expect(() => tokens.color('global.colors.text')).toThrow(InvalidColorFormatError);
    expect(tokens.color('global.colors.border')).toBe('#505050');
  });

  it('resolves color sets with a fallback for unknown keys', () => {
    const tokens = testTokens();

    expect(tokens.setColor('pink')).toBe('#D93A96');
    expect(tokens.setColor('purple')).toBe(DEFAULT_SET_COLOR);
    expect(tokens.setColor('purple', '#FF1493')).toBe('#FF1493');
    expect(tokens.setColor('toString')).toBe(DEFAULT_SET_COLOR);
  });

  it('requires the color-set table', () => {
    const tokens = testTokens({ 'global.colors.property_sets': undefined });

    const error = catchError(() => tokens.setColor('pink'));
    expect(error).toBeInstanceOf(MissingTokenKeyError);
    expect(error).toHaveProperty('path', 'global.colors.property_sets');
  });

  it('is a frozen copy of its source', () => {
    const document = tokenDocument();
    const tokens = DesignTokens.fromObject(document);

    document.global = 'replaced';

    expect(tokens.number('global.card.height')).toBe(455);
    expect(Object.isFrozen(tokens.root)).toBe(true);
    expect(Object.isFrozen(tokens.get('global.card'))).toBe(true);
  });

  it('rejects documents without both sections', () => {
    expect(() => DesignTokens.fromObject([])).toThrow(TokenLoadError);
    expect(() => DesignTokens.fromObject({ global: {} })).toThrow(
      'Failed to load design tokens from <memory>: missing "card_types" section',
    );
  });
});

describe('DesignTokenStore', () => {
  const text = JSON.stringify(tokenDocument());

  it('reads the document once for concurrent loads', async () => {
    const reader = vi.fn(async (_path: string) => text);
    const store = new DesignTokenStore('/virtual/tokens.json', reader);

    const [first, second, third] = await Promise.all([store.load(), store.load(), store.load()]);
    const later = await store.load();

    expect(reader).toHaveBeenCalledTimes(1);
    expect(reader).toHaveBeenCalledWith('/virtual/tokens.json');
    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(later).toBe(first);
  });

  it('retries after a failed load', async () => {
    const reader = vi
      .fn(async (_path: string) => text)
      .mockRejectedValueOnce(new Error('EACCES'));
    const store = new DesignTokenStore('/virtual/tokens.json', reader);

    await expect(store.load()).rejects.toThrow(
      'Failed to load design tokens from /virtual/tokens.json: file could not be read',
    );
    const tokens = await store.load();

    expect(tokens.number('global.card.width')).toBe(413);
    expect(reader).toHaveBeenCalledTimes(2);
  });

  it('reports invalid JSON', async () => {
    const store = new DesignTokenStore('/virtual/broken.json', async () => '{ "global": ');

    await expect(store.load()).rejects.toBeInstanceOf(TokenLoadError);
    await expect(store.load()).rejects.toThrow('invalid JSON');
  });
});

describe('loadTokens', () => {
  it('loads the package token document by default', async () => {
    const tokens = await loadTokens();

    expect(tokens.number('global.card.width')).toBe(413);
    expect(await loadTokens()).toBe(tokens);
  });
});
