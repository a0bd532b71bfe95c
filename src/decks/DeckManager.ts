/**
 * Deck Manager
 *
 * Owns every deck it creates, keyed by caller-supplied identifiers in
 * creation order.
 */

import { Deck } from './Deck.js';
import { DuplicateDeckError, UnknownDeckError, ValidationError } from './errors.js';
import { CryptoRandomSource } from './RandomSource.js';
import type { CardTypeTable } from './CardTypeTable.js';
import type { RandomSource } from './RandomSource.js';
import type { DeckOptions, DeckSnapshot } from './types.js';

export interface DeckManagerOptions {
  /** Bound to every deck created without its own source */
  random?: RandomSource;
}

export class DeckManager {
  private decks: Map<string, Deck> = new Map();
  private readonly random: RandomSource;

  constructor(options: DeckManagerOptions = {}) {
    this.random = options.random ?? new CryptoRandomSource();
  }

  /**
   * Build a deck from a table and register it under `id`.
   */
  createDeck(id: string, table: CardTypeTable, options: Omit<DeckOptions, 'id'> = {}): Deck {
    if (id.trim().length === 0) {
      throw new ValidationError(['deck id must not be empty']);
    }
    if (this.decks.has(id)) {
      throw new DuplicateDeckError(id);
    }

    const deck = new Deck(table, {
      ...options,
      id,
      random: options.random ?? this.random,
    });
    this.decks.set(id, deck);
    return deck;
  }

  getDeck(id: string): Deck {
    const deck = this.decks.get(id);
    if (!deck) {
      throw new UnknownDeckError(id);
    }
    return deck;
  }

  hasDeck(id: string): boolean {
    return this.decks.has(id);
  }

  listDeckIds(): string[] {
    return Array.from(this.decks.keys());
  }

  removeDeck(id: string): void {
    if (!this.decks.delete(id)) {
      throw new UnknownDeckError(id);
    }
  }

  size(): number {
    return this.decks.size;
  }

  /**
   * Snapshot of every deck, in creation order.
   */
  status(): DeckSnapshot[] {
    return Array.from(this.decks.values()).map((deck) => deck.snapshot());
  }

  resetAll(): void {
    for (const deck of this.decks.values()) {
      deck.reset();
    }
  }
}
