/**
 * Card constructors
 *
 * Each constructor validates its variant's required fields, forces the
 * variant tag and returns a frozen card.
 */

import { CardConstructionError } from '../errors';
import type {
  ActionCard,
  CardType,
  MoneyCard,
  PropertyCard,
  RentCard,
  RentTier,
  WildcardCard,
} from '../types/cards';

/**
 * Fields shared by every card constructor
 */
export interface CardInit {
  id: string;
  title: string;
  value?: number;
  description?: string;
  metadata?: Record<string, unknown>;
  /** Accepted for convenience and ignored: the constructor decides the tag */
  type?: string;
}

export interface PropertyCardInit extends CardInit {
  color: string;
  /** Defaults to the title */
  propertyName?: string;
  rentValues?: readonly RentTier[];
  setSize?: number;
}

export interface ActionCardInit extends CardInit {
  /** Defaults to the title */
  actionName?: string;
}

export interface MoneyCardInit extends CardInit {
  denomination?: number;
}

export interface RentCardInit extends CardInit {
  colors?: readonly string[];
  isWild?: boolean;
}

export interface WildcardCardInit extends CardInit {
  allowedColors?: readonly string[];
  isMulticolor?: boolean;
}

function baseFields(cardType: CardType, init: CardInit) {
  if (init.value !== undefined && (!Number.isInteger(init.value) || init.value < 0)) {
    throw new CardConstructionError(cardType, 'value', 'must be a non-negative integer');
  }

  return {
    id: init.id,
    title: init.title,
    value: init.value,
    description: init.description,
    metadata: Object.freeze({ ...init.metadata }),
  };
}

export function createPropertyCard(init: PropertyCardInit): PropertyCard {
  if (!init.color) {
    throw new CardConstructionError('property', 'color', 'is required');
  }

  const rentValues = (init.rentValues ?? []).map((tier) => Object.freeze({ ...tier }));

  const card: PropertyCard = {
    ...baseFields('property', init),
    type: 'property',
    color: init.color,
    propertyName: init.propertyName || init.title,
    rentValues: Object.freeze(rentValues),
    setSize: init.setSize ?? 0,
  };

  return Object.freeze(card);
}

export function createActionCard(init: ActionCardInit): ActionCard {
  const card: ActionCard = {
    ...baseFields('action', init),
    type: 'action',
    actionName: init.actionName || init.title,
  };

  return Object.freeze(card);
}

export function createMoneyCard(init: MoneyCardInit): MoneyCard {
  const { denomination } = init;
  if (denomination === undefined || !Number.isInteger(denomination) || denomination <= 0) {
    throw new CardConstructionError('money', 'denomination', 'must be a positive integer');
  }

  const card: MoneyCard = {
    ...baseFields('money', init),
    value: init.value ?? denomination,
    type: 'money',
    denomination,
  };

  return Object.freeze(card);
}

export function createRentCard(init: RentCardInit): RentCard {
  const card: RentCard = {
    ...baseFields('rent', init),
    type: 'rent',
    colors: Object.freeze([...(init.colors ?? [])]),
    isWild: init.isWild ?? false,
  };

  return Object.freeze(card);
}

export function createWildcardCard(init: WildcardCardInit): WildcardCard {
  const card: WildcardCard = {
    ...baseFields('wildcard', init),
    type: 'wildcard',
    allowedColors: Object.freeze([...(init.allowedColors ?? [])]),
    isMulticolor: init.isMulticolor ?? false,
  };

  return Object.freeze(card);
}
