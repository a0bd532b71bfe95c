/**
 * Deck Loader Tests
 *
 * Uses a scratch directory under the OS temp dir plus the bundled sample data.
 */

import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DeckManager } from '../decks/DeckManager.js';
import { DeckFileError, ValidationError } from '../decks/errors.js';
import { deckIdFromPath, loadDeckDirectory, loadDeckFile, loadDecksInto } from '../loader/DeckLoader.js';

const SAMPLE_DATA = fileURLToPath(new URL('../../data/', import.meta.url));

let scratch = '';

function writeFile(relative: string, contents: string): string {
  const filePath = path.join(scratch, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, contents, 'utf-8');
  return filePath;
}

before(() => {
  scratch = fs.mkdtempSync(path.join(os.tmpdir(), 'card-deck-test-'));
});

after(() => {
  fs.rmSync(scratch, { recursive: true, force: true });
});

describe('deckIdFromPath', () => {
  it('strips the directory and extension', () => {
    assert.equal(deckIdFromPath(path.join('decks', 'event_deck.json')), 'event_deck');
  });
});

describe('loadDeckFile', () => {
  it('parses a definition file', () => {
    const filePath = writeFile(
      'single/tiles.json',
      JSON.stringify({ cards: [{ name: 'Grassland', count: 3 }, { name: 'Desert', count: 2 }] })
    );

    const loaded = loadDeckFile(filePath);

    assert.equal(loaded.id, 'tiles');
    assert.equal(loaded.filePath, filePath);
    assert.deepEqual(loaded.definition.table.names(), ['Grassland', 'Desert']);
    assert.equal(loaded.definition.table.totalCount, 5);
    assert.equal(loaded.definition.reshuffle, false);
  });

  it('accepts an explicit id', () => {
    const filePath = writeFile('single/named.json', JSON.stringify({ cards: [{ name: 'A', count: 1 }] }));
    assert.equal(loadDeckFile(filePath, 'custom').id, 'custom');
  });

  it('reports a missing file', () => {
    const filePath = path.join(scratch, 'missing.json');
    assert.throws(() => loadDeckFile(filePath), {
      name: 'DeckFileError',
      message: `Deck file not found: ${filePath}`,
      filePath,
    });
  });

  it('reports malformed JSON', () => {
    const filePath = writeFile('broken/bad.json', '{ "cards": [');
    assert.throws(() => loadDeckFile(filePath), {
      name: 'DeckFileError',
      message: `Deck file is not valid JSON: ${filePath}`,
    });
  });

  it('surfaces schema problems as ValidationError', () => {
    const filePath = writeFile('invalid/structure.json', JSON.stringify({ invalid: 'structure' }));
    assert.throws(
      () => loadDeckFile(filePath),
      (error: unknown) =>
        error instanceof ValidationError && error.issues.join('|') === 'cards: cards is required'
    );
  });

  it('rejects a non-positive count in the file', () => {
    const filePath = writeFile(
      'invalid/count.json',
      JSON.stringify({ cards: [{ name: 'Grassland', count: 0 }] })
    );
    assert.throws(() => loadDeckFile(filePath), ValidationError);
  });
});

describe('loadDeckDirectory', () => {
  it('loads every JSON file sorted by name and skips others', () => {
    writeFile('multi/zeta.json', JSON.stringify({ cards: [{ name: 'Z', count: 1 }] }));
    writeFile('multi/alpha.json', JSON.stringify({ cards: [{ name: 'A', count: 2 }], reshuffle: true }));
    writeFile('multi/notes.txt', 'not a deck');

    const loaded = loadDeckDirectory(path.join(scratch, 'multi'));

    assert.deepEqual(
      loaded.map((entry) => entry.id),
      ['alpha', 'zeta']
    );
    assert.equal(loaded[0]?.definition.reshuffle, true);
  });

  it('rejects a directory without definitions', () => {
    const dirPath = path.join(scratch, 'empty');
    fs.mkdirSync(dirPath, { recursive: true });
    assert.throws(() => loadDeckDirectory(dirPath), {
      name: 'DeckFileError',
      message: `No deck definitions found in directory: ${dirPath}`,
    });
  });
});

describe('loadDecksInto', () => {
  it('registers a single file under its file name', () => {
    const filePath = writeFile('into/solo.json', JSON.stringify({ cards: [{ name: 'A', count: 2 }] }));
    const manager = new DeckManager();

    assert.deepEqual(loadDecksInto(manager, filePath), ['solo']);
    assert.equal(manager.getDeck('solo').remaining(), 2);
  });

  it('reports a missing source', () => {
    const manager = new DeckManager();
    assert.throws(() => loadDecksInto(manager, path.join(scratch, 'nowhere')), DeckFileError);
    assert.equal(manager.size(), 0);
  });

  it('loads the bundled example decks', () => {
    const manager = new DeckManager();
    const ids = loadDecksInto(manager, path.join(SAMPLE_DATA, 'example_deck'));

    assert.deepEqual(ids, ['event_deck', 'example_deck']);
    assert.equal(manager.getDeck('event_deck').reshuffle, true);
    assert.equal(manager.getDeck('example_deck').reshuffle, false);
    assert.equal(manager.getDeck('example_deck').totalCount(), 18);
  });

  it('loads the bundled default deck', () => {
    const manager = new DeckManager();
    loadDecksInto(manager, path.join(SAMPLE_DATA, 'cards.json'));

    const deck = manager.getDeck('cards');
    assert.equal(deck.remaining(), 14);
    assert.equal(deck.remainingOf('Desert'), 1);
  });

  it('logs each deck at debug level', () => {
    const filePath = writeFile('logged/one.json', JSON.stringify({ cards: [{ name: 'A', count: 1 }] }));
    const messages: string[] = [];
    const logger = {
      level: 'debug' as const,
      info: (): void => {},
      debug: (msg: string): void => {
        messages.push(msg);
      },
      error: (): void => {},
    };

    loadDecksInto(new DeckManager(), filePath, logger);
    assert.deepEqual(messages, ['Loaded deck one']);
  });
});
