/**
 * Random Card Deck
 *
 * Library entrypoint: the deck engine, definition schemas and loader.
 */

// Engine
export {
  CardTypeTable,
  parseCardTypeTable,
  parseDeckDefinition,
  Deck,
  createDeck,
  DeckManager,
  drawUnit,
  selectIndex,
  CryptoRandomSource,
  SeededRandomSource,
  ScriptedRandomSource,
  ValidationError,
  EmptyDeckError,
  DuplicateDeckError,
  UnknownDeckError,
  UnknownCardError,
  DeckFileError,
} from './decks/index.js';
export type {
  CardTypeEntry,
  DeckDefinition,
  DeckOptions,
  DeckEntrySnapshot,
  DeckSnapshot,
  DrawOutcome,
  DeckManagerOptions,
  RandomSource,
} from './decks/index.js';

// Schemas
export {
  CardTypeEntrySchema,
  CardTypeEntriesSchema,
  DeckDefinitionSchema,
  validateCardTypeEntries,
  validateDeckDefinition,
  isValidDeckDefinition,
  MAX_TOTAL_CARDS,
} from './schemas/DeckDefinition.js';
export type { CardTypeEntryInput, DeckDefinitionInput } from './schemas/DeckDefinition.js';

// Loader
export { loadDeckFile, loadDeckDirectory, loadDecksInto, deckIdFromPath } from './loader/DeckLoader.js';
export type { LoadedDeck } from './loader/DeckLoader.js';

// Session
export { DeckSession, HELP_LINES, MAX_DRAW_COUNT } from './cli/DeckSession.js';
export type { DeckSessionOptions, CommandResult, OutputWriter } from './cli/DeckSession.js';

// Config and logging
export { loadEnvConfig, validateConfig, DEFAULT_CARDS_PATH } from './config/env.js';
export type { EnvConfig, RawEnvConfig, ConfigOverrides } from './config/env.js';
export { ConsoleLogger, DEFAULT_LOG_PREFIX } from './utils/ConsoleLogger.js';
export type { ConsoleLoggerOptions, LogWriter } from './utils/ConsoleLogger.js';
export type { Logger, LogLevel } from './utils/Logger.js';
