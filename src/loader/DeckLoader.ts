/**
 * Deck Loader
 *
 * Reads deck definition documents from JSON files and registers them with
 * a deck manager. This is the only part of the project that touches the
 * filesystem for decks.
 */

import fs from 'fs';
import path from 'path';
import { parseDeckDefinition } from '../decks/CardTypeTable.js';
import { DeckFileError } from '../decks/errors.js';
import type { DeckManager } from '../decks/DeckManager.js';
import type { DeckDefinition } from '../decks/types.js';
import type { Logger } from '../utils/Logger.js';

export interface LoadedDeck {
  id: string;
  filePath: string;
  definition: DeckDefinition;
}

const DEFINITION_EXTENSION = '.json';

/**
 * Deck id derived from a definition file name: `decks/event_deck.json` -> `event_deck`.
 */
export function deckIdFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function readJson(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    const reason = code === 'ENOENT' ? 'Deck file not found' : 'Deck file could not be read';
    throw new DeckFileError(filePath, reason, { cause: error });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DeckFileError(filePath, 'Deck file is not valid JSON', { cause: error });
  }
}

/**
 * Load and validate one definition file.
 */
export function loadDeckFile(filePath: string, id: string = deckIdFromPath(filePath)): LoadedDeck {
  const document = readJson(filePath);
  return {
    id,
    filePath,
    definition: parseDeckDefinition(document),
  };
}

/**
 * Load every `.json` definition in a directory, sorted by file name.
 */
export function loadDeckDirectory(dirPath: string): LoadedDeck[] {
  let names: string[];
  try {
    names = fs.readdirSync(dirPath);
  } catch (error) {
    throw new DeckFileError(dirPath, 'Deck directory could not be read', { cause: error });
  }

  const files = names
    .filter((name) => path.extname(name).toLowerCase() === DEFINITION_EXTENSION)
    .sort();

  if (files.length === 0) {
    throw new DeckFileError(dirPath, 'No deck definitions found in directory');
  }

  return files.map((name) => loadDeckFile(path.join(dirPath, name)));
}

/**
 * Load a definition file or a directory of them, registering each deck.
 * Returns the ids created, in load order.
 */
export function loadDecksInto(manager: DeckManager, source: string, logger?: Logger): string[] {
  let isDirectory = false;
  try {
    isDirectory = fs.statSync(source).isDirectory();
  } catch (error) {
    throw new DeckFileError(source, 'Deck source not found', { cause: error });
  }

  const loaded = isDirectory ? loadDeckDirectory(source) : [loadDeckFile(source)];

  for (const entry of loaded) {
    manager.createDeck(entry.id, entry.definition.table, {
      reshuffle: entry.definition.reshuffle,
    });
    logger?.debug(`Loaded deck ${entry.id}`, {
      file: entry.filePath,
      cards: entry.definition.table.totalCount,
      reshuffle: entry.definition.reshuffle,
    });
  }

  return loaded.map((entry) => entry.id);
}
