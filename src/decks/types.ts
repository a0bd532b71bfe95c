/**
 * Deck Types
 *
 * Shapes shared by the card type table, decks and the deck manager.
 */

import type { CardTypeTable } from './CardTypeTable.js';
import type { RandomSource } from './RandomSource.js';

/**
 * One distinct card type and how many copies a fresh deck holds.
 */
export interface CardTypeEntry {
  readonly name: string;
  readonly originalCount: number;
}

/**
 * Parsed deck definition: the card type table plus deck-level options.
 */
export interface DeckDefinition {
  table: CardTypeTable;
  /** Refill the deck automatically when a draw finds it empty */
  reshuffle: boolean;
}

export interface DeckOptions {
  /** Identifier used in error messages; the manager passes the registry id */
  id?: string;
  /** Random source used when a draw call does not supply one */
  random?: RandomSource;
  reshuffle?: boolean;
}

export interface DeckEntrySnapshot {
  name: string;
  originalCount: number;
  remainingCount: number;
}

export interface DeckSnapshot {
  id?: string;
  entries: DeckEntrySnapshot[];
  totalRemaining: number;
  totalCount: number;
  drawn: string[];
  reshuffle: boolean;
}

export interface DrawOutcome {
  card: string;
  /** True when the deck was empty and refilled before this draw */
  reshuffled: boolean;
}
