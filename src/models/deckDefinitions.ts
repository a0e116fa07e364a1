/**
 * Deck definitions
 *
 * Expands parsed deck documents (one section per variant, snake_case
 * keys) into card instances. `quantity` copies of a definition get
 * numbered ids.
 */

import type { Card, CardType } from '../types/cards';
import {
  createActionCard,
  createMoneyCard,
  createPropertyCard,
  createRentCard,
  createWildcardCard,
} from './cards';

interface DefinitionBase {
  id: string;
  name: string;
  /** Number of copies in the deck, default 1 */
  quantity?: number;
}

export interface PropertyCardDefinition extends DefinitionBase {
  color: string;
  value: number;
  /** `[propertiesOwned, rent]` pairs */
  rent_values: ReadonlyArray<readonly [number, number]>;
  set_size: number;
}

export interface ActionCardDefinition extends DefinitionBase {
  value: number;
  description?: string;
}

export interface MoneyCardDefinition {
  denomination: number;
  quantity?: number;
}

export interface RentCardDefinition extends DefinitionBase {
  value: number;
  description?: string;
  colors?: readonly string[];
  is_wild?: boolean;
}

export interface WildcardCardDefinition extends DefinitionBase {
  value?: number;
  description?: string;
  allowed_colors?: readonly string[];
  is_multicolor?: boolean;
}

export interface DeckDefinitions {
  property_cards?: readonly PropertyCardDefinition[];
  action_cards?: readonly ActionCardDefinition[];
  money_cards?: readonly MoneyCardDefinition[];
  rent_cards?: readonly RentCardDefinition[];
  wildcard_cards?: readonly WildcardCardDefinition[];
}

/**
 * Ids for `quantity` copies: the bare id for one copy, `<id>-1..n` otherwise
 */
export function copyIds(id: string, quantity: number = 1): string[] {
  if (quantity <= 1) {
    return quantity === 1 ? [id] : [];
  }
  return Array.from({ length: quantity }, (_, index) => `${id}-${index + 1}`);
}

export function createPropertyCardInstances(
  definitions: readonly PropertyCardDefinition[],
): Card[] {
  return definitions.flatMap((definition) =>
    copyIds(definition.id, definition.quantity).map((id) =>
      createPropertyCard({
        id,
        title: definition.name,
        propertyName: definition.name,
        color: definition.color,
        value: definition.value,
        rentValues: definition.rent_values.map(([propertiesOwned, rent]) => ({
          propertiesOwned,
          rent,
        })),
        setSize: definition.set_size,
      }),
    ),
  );
}

export function createActionCardInstances(definitions: readonly ActionCardDefinition[]): Card[] {
  return definitions.flatMap((definition) =>
    copyIds(definition.id, definition.quantity).map((id) =>
      createActionCard({
        id,
        title: definition.name,
        actionName: definition.name,
        value: definition.value,
        description: definition.description ?? '',
      }),
    ),
  );
}

export function createMoneyCardInstances(definitions: readonly MoneyCardDefinition[]): Card[] {
  return definitions.flatMap(({ denomination, quantity }) =>
    copyIds(`money-${denomination}m`, quantity).map((id) =>
      createMoneyCard({
        id,
        title: `$${denomination}M`,
        denomination,
        value: denomination,
      }),
    ),
  );
}

export function createRentCardInstances(definitions: readonly RentCardDefinition[]): Card[] {
  return definitions.flatMap((definition) =>
    copyIds(definition.id, definition.quantity).map((id) =>
      createRentCard({
        id,
        title: definition.name,
        value: definition.value,
        description: definition.description ?? '',
        colors: definition.colors ?? [],
        isWild: definition.is_wild ?? false,
      }),
    ),
  );
}

export function createWildcardCardInstances(
  definitions: readonly WildcardCardDefinition[],
): Card[] {
  return definitions.flatMap((definition) =>
    copyIds(definition.id, definition.quantity).map((id) =>
      createWildcardCard({
        id,
        title: definition.name,
        value: definition.value ?? 0,
        description: definition.description ?? '',
        allowedColors: definition.allowed_colors ?? [],
        isMulticolor: definition.is_multicolor ?? false,
      }),
    ),
  );
}

/**
 * Expand every section, or only the section for `cardType`. Missing
 * sections are skipped.
 */
export function createCardInstances(definitions: DeckDefinitions, cardType?: CardType): Card[] {
  const wants = (type: CardType) => cardType === undefined || cardType === type;
  const cards: Card[] = [];

  if (wants('property') && definitions.property_cards) {
    cards.push(...createPropertyCardInstances(definitions.property_cards));
  }
  if (wants('action') && definitions.action_cards) {
    cards.push(...createActionCardInstances(definitions.action_cards));
  }
  if (wants('money') && definitions.money_cards) {
    cards.push(...createMoneyCardInstances(definitions.money_cards));
  }
  if (wants('rent') && definitions.rent_cards) {
    cards.push(...createRentCardInstances(definitions.rent_cards));
  }
  if (wants('wildcard') && definitions.wildcard_cards) {
    cards.push(...createWildcardCardInstances(definitions.wildcard_cards));
  }

  return cards;
}
