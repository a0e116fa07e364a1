import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  InvalidColorFormatError,
  InvalidTokenValueError,
  MissingTokenKeyError,
  UnsupportedCardTypeError,
} from '../../errors';
import {
  createActionCard,
  createMoneyCard,
  createPropertyCard,
  createRentCard,
  createWildcardCard,
} from '../../models/cards';
import { catchError, testTokens } from '../../test/tokens';
import { COLOR_SET_KEYS, type Card } from '../../types/cards';
import { drawColorStripes, drawPropertyRentRow, drawValueBadge } from '../elements';
import { drawCircle, drawPieSlice, drawText } from '../primitives';
import { splitActionName } from './ActionCardTemplate';
import { CardTemplateFactory } from './CardTemplateFactory';

vi.mock('../elements', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../elements')>();
  return {
    ...actual,
    drawColorStripes: vi.fn(actual.drawColorStripes),
    drawPropertyRentRow: vi.fn(actual.drawPropertyRentRow),
    drawValueBadge: vi.fn(actual.drawValueBadge),
  };
});

vi.mock('../primitives', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../primitives')>();
  return {
    ...actual,
    drawCircle: vi.fn(actual.drawCircle),
    drawPieSlice: vi.fn(actual.drawPieSlice),
    drawText: vi.fn(actual.drawText),
  };
});

const FONT = 'Arial, sans-serif';
const CENTER_X = 206;

const tokens = testTokens();
const factory = new CardTemplateFactory(tokens);

function render(card: Card) {
  return factory.createTemplate(card).render();
}

/** Positions of every drawText call that drew `text` */
function textPositions(text: string) {
  return vi
    .mocked(drawText)
    .mock.calls.filter((call) => call[1] === text)
    .map((call) => call[2]);
}

function badgeCalls() {
  return vi.mocked(drawValueBadge).mock.calls.map(([, value, center]) => ({ value, center }));
}

const sampleCards: Card[] = [
  createPropertyCard({ id: 'p', title: 'Mayfair', color: 'dark_blue', value: 4 }),
  createActionCard({ id: 'a', title: 'Pass Go', value: 1, description: 'Draw two cards.' }),
  createMoneyCard({ id: 'm', title: '$2M', denomination: 2 }),
  createRentCard({ id: 'r', title: 'Rent', colors: ['red', 'yellow'], value: 1 }),
  createWildcardCard({ id: 'w', title: '', isMulticolor: true }),
];

beforeEach(() => {
  vi.clearAllMocks();
});

describe('every template', () => {
  it.each(sampleCards)('renders $type cards at the card size', (card) => {
    const canvas = render(card);

    expect(canvas.width).toBe(413);
    expect(canvas.height).toBe(455);
  });

  it('draws the footer line', () => {
    render(sampleCards[2]);

    expect(textPositions('PROPERTY TRADING DECK')).toEqual([{ x: CENTER_X, y: 430 }]);
  });

  it('renders the same pixels twice', () => {
    for (const card of sampleCards) {
      const first = render(card).toBuffer('image/png');
      const second = render(card).toBuffer('image/png');

      expect(first.equals(second)).toBe(true);
    }
  });
});

describe('PropertyCardTemplate', () => {
  const property = createPropertyCard({
    id: 'dark-blue-01',
    title: 'Mayfair',
    color: 'dark_blue',
    value: 4,
    rentValues: [
      { propertiesOwned: 1, rent: 3 },
      { propertiesOwned: 2, rent: 8 },
    ],
    setSize: 2,
  });

  it('draws one rent row per tier in order', () => {
    render(property);

    expect(vi.mocked(drawPropertyRentRow).mock.calls.map((call) => call.slice(1))).toEqual([
      [200, 1, 3, '#0072BB', { xStart: 30, rowWidth: 353, fontFamily: FONT }],
      [255, 2, 8, '#0072BB', { xStart: 30, rowWidth: 353, fontFamily: FONT }],
    ]);
  });

  it('upper-cases the name inside the header', () => {
    render(property);

    expect(textPositions('MAYFAIR')).toEqual([{ x: CENTER_X, y: 60 }]);
    expect(textPositions('RENT')).toEqual([{ x: CENTER_X, y: 135 }]);
  });

  it('falls back to the default set color', () => {
    render(createPropertyCard({ ...property, color: 'purple' }));

    expect(vi.mocked(drawPropertyRentRow).mock.calls.map((call) => call[4])).toEqual([
      '#228B22',
      '#228B22',
    ]);
  });

  it('draws a top-left badge only when a value is set', () => {
    render(property);
    expect(badgeCalls()).toEqual([{ value: 4, center: { x: 40, y: 40 } }]);

    vi.clearAllMocks();
    render(createPropertyCard({ ...property, value: 0 }));
    expect(badgeCalls()).toEqual([]);
  });
});

describe('splitActionName', () => {
  it('keeps names up to twelve characters on one line', () => {
    expect(splitActionName('Deal Breaker')).toEqual(['Deal Breaker']);
  });

  it('splits longer names at the word midpoint', () => {
    expect(splitActionName('Forced Deal Now')).toEqual(['Forced', 'Deal Now']);
    expect(splitActionName('Pass Go Now Please')).toEqual(['Pass Go', 'Now Please']);
  });

  it('keeps a single long word whole', () => {
    expect(splitActionName('Housewarming!')).toEqual(['Housewarming!']);
  });
});

describe('ActionCardTemplate', () => {
  it('draws split names above and below the circle center', () => {
    render(createActionCard({ id: 'debt', title: 'Debt Collector', value: 3 }));

    expect(textPositions('ACTION CARD')).toEqual([{ x: CENTER_X, y: 45 }]);
    expect(textPositions('DEBT')).toEqual([{ x: CENTER_X, y: 155 }]);
    expect(textPositions('COLLECTOR')).toEqual([{ x: CENTER_X, y: 195 }]);
  });

  it('draws badges in both corners when a value is set', () => {
    render(createActionCard({ id: 'go', title: 'Pass Go', value: 1 }));

    expect(textPositions('PASS GO')).toEqual([{ x: CENTER_X, y: 175 }]);
    expect(badgeCalls()).toEqual([
      { value: 1, center: { x: 40, y: 40 } },
      { value: 1, center: { x: 373, y: 415 } },
    ]);
  });

  it('rejects an unknown border pattern', () => {
    const zigzag = testTokens({ 'card_types.action.layout.border.pattern': 'zigzag' });
    const template = new CardTemplateFactory(zigzag).createTemplate(sampleCards[1]);

    expect(() => template.render()).toThrow(InvalidTokenValueError);
  });
});

describe('MoneyCardTemplate', () => {
  it('shows the denomination in the circle and both corners', () => {
    render(createMoneyCard({ id: 'money-5m', title: '$5M', denomination: 5, value: 0 }));

    expect(textPositions('$5M')).toEqual([{ x: CENTER_X, y: 227 }]);
    expect(badgeCalls()).toEqual([
      { value: 5, center: { x: 40, y: 40 } },
      { value: 5, center: { x: 373, y: 415 } },
    ]);
  });

  it('names a missing layout token', () => {
    const incomplete = testTokens({ 'card_types.money.layout.denomination_circle': undefined });

    const error = catchError(() =>
      new CardTemplateFactory(incomplete).createTemplate(sampleCards[2]).render(),
    );

    expect(error).toBeInstanceOf(MissingTokenKeyError);
    expect(error).toHaveProperty('path', 'card_types.money.layout.denomination_circle.center_y');
  });
});

describe('RentCardTemplate', () => {
  const center = { x: CENTER_X, y: 175 };

  it('fans all ten color sets on wild cards, ignoring colors', () => {
    render(createRentCard({ id: 'rent-wild', title: 'Rent', colors: ['brown', 'pink'], isWild: true }));

    const slices = vi.mocked(drawPieSlice).mock.calls;
    expect(slices).toHaveLength(10);
    expect(slices.map((call) => [call[3], call[4]])).toEqual(
      COLOR_SET_KEYS.map((_, index) => [index * 36, (index + 1) * 36]),
    );
    expect(slices.map((call) => call[5].fill)).toEqual(COLOR_SET_KEYS.map((key) => tokens.setColor(key)));
    expect(slices.every((call) => call[2] === 95)).toBe(true);
    expect(textPositions('ALL')).toEqual([{ x: CENTER_X, y: 160 }]);
    expect(textPositions('COLORS')).toEqual([{ x: CENTER_X, y: 190 }]);
  });

  it('draws outer and inner discs for two colors', () => {
    render(createRentCard({ id: 'rent-ry', title: 'Rent', colors: ['red', 'yellow'] }));

    expect(vi.mocked(drawPieSlice)).not.toHaveBeenCalled();
    expect(vi.mocked(drawCircle).mock.calls.map((call) => call.slice(1))).toEqual([
      [center, 95, { fill: '#ED1B24', outline: '#000000', width: 4 }],
      [center, 50, { fill: '#FEF200', outline: '#000000', width: 3 }],
    ]);
  });

  it('uses fallback colors for unknown sets', () => {
    render(createRentCard({ id: 'rent-x', title: 'Rent', colors: ['purple', 'teal'] }));

    expect(vi.mocked(drawCircle).mock.calls.map((call) => call[3].fill)).toEqual([
      '#228B22',
      '#FF1493',
    ]);
  });

  it('draws a single disc for one color and none for zero', () => {
    render(createRentCard({ id: 'rent-one', title: 'Rent', colors: ['green'] }));
    expect(vi.mocked(drawCircle)).toHaveBeenCalledTimes(1);

    vi.clearAllMocks();
    render(createRentCard({ id: 'rent-none', title: 'Rent' }));
    expect(vi.mocked(drawCircle)).not.toHaveBeenCalled();
  });
});

describe('WildcardCardTemplate', () => {
  it('stripes every color set for multicolor cards', () => {
    render(createWildcardCard({ id: 'wild', title: '', isMulticolor: true, allowedColors: ['red'] }));

    const [call] = vi.mocked(drawColorStripes).mock.calls;
    expect(call.slice(1)).toEqual([
      COLOR_SET_KEYS.map((key) => tokens.setColor(key)),
      30,
      60,
      { xStart: 30, xEnd: 383 },
    ]);
    expect(textPositions('PROPERTY WILD CARD')).toEqual([{ x: CENTER_X, y: 115 }]);
    expect(textPositions('WILD')).toEqual([{ x: CENTER_X, y: 215 }]);
  });

  it('stripes only the first two allowed colors', () => {
    render(
      createWildcardCard({
        id: 'wild-ry',
        title: 'Red or Yellow',
        allowedColors: ['red', 'yellow', 'green'],
        value: 3,
      }),
    );

    expect(vi.mocked(drawColorStripes).mock.calls[0][1]).toEqual(['#ED1B24', '#FEF200']);
    expect(textPositions('RED OR YELLOW')).toEqual([{ x: CENTER_X, y: 115 }]);
    expect(badgeCalls()).toEqual([{ value: 3, center: { x: 40, y: 40 } }]);
  });
});

describe('CardTemplateFactory', () => {
  it('rejects an unknown variant tag', () => {
    const joker: Card = JSON.parse('{"id":"joker","type":"joker","title":"Joker","metadata":{}}');

    const error = catchError(() => factory.createTemplate(joker));

    expect(error).toBeInstanceOf(UnsupportedCardTypeError);
    expect(error).toHaveProperty('cardType', 'joker');
  });

  it('aborts on an invalid background color', () => {
    const broken = testTokens({ 'card_types.money.colors.background': '#E3F1D' });

    expect(() => new CardTemplateFactory(broken).createTemplate(sampleCards[2]).render()).toThrow(
      InvalidColorFormatError,
    );
  });

  it('passes typography overrides to templates', () => {
    const custom = factory.withConfig({ typography: { fontFamily: 'Test Sans' } });

    custom.createTemplate(sampleCards[0]).render();

    expect(vi.mocked(drawPropertyRentRow)).not.toHaveBeenCalled();
    expect(vi.mocked(drawText).mock.calls.every((call) => call[3].family === 'Test Sans')).toBe(true);
  });
});

describe('end to end', () => {
  it('renders a green property with three rent rows and one $4M badge', () => {
    const canvas = render(
      createPropertyCard({
        id: 'green-01',
        title: 'Bond Street',
        color: 'green',
        value: 4,
        rentValues: [
          { propertiesOwned: 1, rent: 2 },
          { propertiesOwned: 2, rent: 4 },
          { propertiesOwned: 3, rent: 7 },
        ],
        setSize: 3,
      }),
    );

    const rows = vi.mocked(drawPropertyRentRow).mock.calls;
    expect(rows.map((call) => [call[1], call[2], call[3]])).toEqual([
      [200, 1, 2],
      [255, 2, 4],
      [310, 3, 7],
    ]);
    expect(rows.every((call) => call[4] === '#1FB25A')).toBe(true);
    expect(badgeCalls()).toEqual([{ value: 4, center: { x: 40, y: 40 } }]);
    expect(Array.from(canvas.getContext('2d').getImageData(CENTER_X, 30, 1, 1).data)).toEqual([
      0x1f, 0xb2, 0x5a, 255,
    ]);
  });

  it('draws rent rows in declared order without sorting', () => {
    render(
      createPropertyCard({
        id: 'brown-02',
        title: 'Old Road',
        color: 'brown',
        rentValues: [
          { propertiesOwned: 2, rent: 4 },
          { propertiesOwned: 1, rent: 2 },
        ],
      }),
    );

    expect(vi.mocked(drawPropertyRentRow).mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [200, 2],
      [255, 1],
    ]);
  });

  it('renders a $5M money card with two $5M corner badges', () => {
    render(createMoneyCard({ id: 'money-5m', title: '$5M', denomination: 5 }));

    expect(textPositions('$5M')).toEqual([{ x: CENTER_X, y: 227 }]);
    expect(badgeCalls().map((call) => call.value)).toEqual([5, 5]);
  });

  it('renders a ten-block stripe header for a multicolor wildcard', () => {
    render(createWildcardCard({ id: 'wild-all', title: 'Wild', isMulticolor: true }));

    expect(vi.mocked(drawColorStripes).mock.calls[0][1]).toHaveLength(10);
  });
});
