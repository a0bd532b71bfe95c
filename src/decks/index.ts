/**
 * Decks Module
 *
 * Exports the card type table, decks, the deck manager, random sources
 * and errors.
 */

export type {
  CardTypeEntry,
  DeckDefinition,
  DeckOptions,
  DeckEntrySnapshot,
  DeckSnapshot,
  DrawOutcome,
} from './types.js';

export {
  CardTypeTable,
  parseCardTypeTable,
  parseDeckDefinition,
} from './CardTypeTable.js';

export { Deck, createDeck } from './Deck.js';

export { DeckManager, type DeckManagerOptions } from './DeckManager.js';

export { drawUnit, selectIndex } from './DrawEngine.js';

export {
  CryptoRandomSource,
  SeededRandomSource,
  ScriptedRandomSource,
  type RandomSource,
} from './RandomSource.js';

export {
  ValidationError,
  EmptyDeckError,
  DuplicateDeckError,
  UnknownDeckError,
  UnknownCardError,
  DeckFileError,
} from './errors.js';
