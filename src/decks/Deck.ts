/**
 * Deck
 *
 * Mutable remaining-count multiset derived from a card type table.
 * Counts change only through draw and reset, and every failing call
 * leaves the deck exactly as it was.
 */

import { drawUnit, selectIndex } from './DrawEngine.js';
import { EmptyDeckError, UnknownCardError } from './errors.js';
import { CryptoRandomSource } from './RandomSource.js';
import type { CardTypeTable } from './CardTypeTable.js';
import type { RandomSource } from './RandomSource.js';
import type { DeckEntrySnapshot, DeckOptions, DeckSnapshot, DrawOutcome } from './types.js';

export class Deck {
  readonly table: CardTypeTable;
  readonly id?: string;
  readonly reshuffle: boolean;
  private readonly random: RandomSource;
  private readonly counts: number[];
  private totalRemaining: number;
  private history: string[] = [];

  constructor(table: CardTypeTable, options: DeckOptions = {}) {
    this.table = table;
    this.id = options.id;
    this.reshuffle = options.reshuffle ?? false;
    this.random = options.random ?? new CryptoRandomSource();
    this.counts = table.entries.map((entry) => entry.originalCount);
    this.totalRemaining = table.totalCount;
  }

  /**
   * Draw one card, weighted by remaining copies.
   *
   * Throws EmptyDeckError when nothing remains, unless the deck reshuffles.
   */
  draw(random?: RandomSource): string {
    return this.drawWithDetail(random).card;
  }

  /**
   * Draw one card and report whether the deck had to be refilled first.
   */
  drawWithDetail(random: RandomSource = this.random): DrawOutcome {
    const reshuffled = this.totalRemaining === 0;
    if (reshuffled && !this.reshuffle) {
      throw new EmptyDeckError(this.id);
    }

    const k = drawUnit(random, reshuffled ? this.table.totalCount : this.totalRemaining);
    if (reshuffled) {
      this.reset();
    }

    const index = selectIndex(this.counts, k);
    const card = this.nameAt(index);
    this.counts[index] = (this.counts[index] ?? 0) - 1;
    this.totalRemaining--;
    this.history.push(card);
    return { card, reshuffled };
  }

  /**
   * Draw up to `count` cards. A deck that does not reshuffle stops early
   * once it runs out instead of throwing.
   */
  drawMany(count: number, random?: RandomSource): string[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Draw count must be a non-negative integer, got ${count}`);
    }

    const drawn: string[] = [];
    for (let i = 0; i < count; i++) {
      if (this.isEmpty() && !this.reshuffle) {
        break;
      }
      drawn.push(this.draw(random));
    }
    return drawn;
  }

  /**
   * Restore every card type to its original count.
   */
  reset(): void {
    this.table.entries.forEach((entry, index) => {
      this.counts[index] = entry.originalCount;
    });
    this.totalRemaining = this.table.totalCount;
    this.history = [];
  }

  remaining(): number {
    return this.totalRemaining;
  }

  isEmpty(): boolean {
    return this.totalRemaining === 0;
  }

  totalCount(): number {
    return this.table.totalCount;
  }

  remainingOf(name: string): number {
    const index = this.table.indexOf(name);
    if (index < 0) {
      throw new UnknownCardError(name);
    }
    return this.counts[index] ?? 0;
  }

  /** Names drawn since the last reset, oldest first. */
  drawn(): string[] {
    return [...this.history];
  }

  entries(): DeckEntrySnapshot[] {
    return this.table.entries.map((entry, index) => ({
      name: entry.name,
      originalCount: entry.originalCount,
      remainingCount: this.counts[index] ?? 0,
    }));
  }

  snapshot(): DeckSnapshot {
    return {
      id: this.id,
      entries: this.entries(),
      totalRemaining: this.totalRemaining,
      totalCount: this.table.totalCount,
      drawn: this.drawn(),
      reshuffle: this.reshuffle,
    };
  }

  private nameAt(index: number): string {
    const entry = this.table.entries[index];
    if (!entry) {
      throw new RangeError(`No card type at position ${index}`);
    }
    return entry.name;
  }
}

export function createDeck(table: CardTypeTable, options?: DeckOptions): Deck {
  return new Deck(table, options);
}
