/**
 * Card Type Table
 *
 * Immutable, ordered record of each distinct card name and its original
 * count. Built once from a definition and shared by every reset of the
 * deck created from it.
 */

import { validateCardTypeEntries, validateDeckDefinition } from '../schemas/DeckDefinition.js';
import type { CardTypeEntry, DeckDefinition } from './types.js';

export class CardTypeTable {
  readonly entries: readonly CardTypeEntry[];
  readonly totalCount: number;
  private readonly positions: ReadonlyMap<string, number>;

  private constructor(entries: CardTypeEntry[]) {
    this.entries = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
    this.totalCount = entries.reduce((sum, entry) => sum + entry.originalCount, 0);
    this.positions = new Map(entries.map((entry, index): [string, number] => [entry.name, index]));
  }

  /**
   * Validate raw `{ name, count }` entries and build a table in input order.
   * Throws ValidationError on any malformed entry, duplicate name or empty list.
   */
  static parse(entries: unknown): CardTypeTable {
    const validated = validateCardTypeEntries(entries);
    return new CardTypeTable(
      validated.map((entry) => ({ name: entry.name, originalCount: entry.count }))
    );
  }

  get size(): number {
    return this.entries.length;
  }

  /** Position of a card type, or -1 when the name is not in the table. */
  indexOf(name: string): number {
    return this.positions.get(name) ?? -1;
  }

  has(name: string): boolean {
    return this.positions.has(name);
  }

  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }
}

export function parseCardTypeTable(entries: unknown): CardTypeTable {
  return CardTypeTable.parse(entries);
}

/**
 * Parse a definition document (`{ cards: [...], reshuffle? }`).
 */
export function parseDeckDefinition(document: unknown): DeckDefinition {
  const validated = validateDeckDefinition(document);
  return {
    table: CardTypeTable.parse(validated.cards),
    reshuffle: validated.reshuffle ?? false,
  };
}
