/**
 * Card data model
 *
 * A card is a tagged union on `type`. Instances are created through the
 * constructors in `models/cards` and never mutated afterwards.
 */

export const CARD_TYPES = ['property', 'action', 'money', 'rent', 'wildcard'] as const;

export type CardType = (typeof CARD_TYPES)[number];

/**
 * Canonical order of the ten color sets (wild rent slices, multicolor stripes)
 */
export const COLOR_SET_KEYS = [
  'brown',
  'light_blue',
  'pink',
  'orange',
  'red',
  'yellow',
  'green',
  'dark_blue',
  'railroad',
  'utility',
] as const;

export type ColorSetKey = (typeof COLOR_SET_KEYS)[number];

/**
 * One row of a property rent table
 */
export interface RentTier {
  /** Number of properties of the set owned */
  propertiesOwned: number;
  /** Rent charged, in millions */
  rent: number;
}

interface BaseCard {
  /** Unique within a render batch, used as the output file stem */
  readonly id: string;
  readonly title: string;
  /** Face value in millions */
  readonly value?: number;
  readonly description?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface PropertyCard extends BaseCard {
  readonly type: 'property';
  /** Color-set key, may be a custom name not present in the token colors */
  readonly color: string;
  readonly propertyName: string;
  /** Rendered top to bottom in this order */
  readonly rentValues: readonly RentTier[];
  /** Cards of this color needed for a complete set */
  readonly setSize: number;
}

export interface ActionCard extends BaseCard {
  readonly type: 'action';
  readonly actionName: string;
}

export interface MoneyCard extends BaseCard {
  readonly type: 'money';
  readonly denomination: number;
}

export interface RentCard extends BaseCard {
  readonly type: 'rent';
  /** Up to two color-set keys, ignored when `isWild` */
  readonly colors: readonly string[];
  readonly isWild: boolean;
}

export interface WildcardCard extends BaseCard {
  readonly type: 'wildcard';
  /** Ignored when `isMulticolor` */
  readonly allowedColors: readonly string[];
  readonly isMulticolor: boolean;
}

export type Card = PropertyCard | ActionCard | MoneyCard | RentCard | WildcardCard;
