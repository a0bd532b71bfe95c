/**
 * Deck Session
 *
 * Interprets one line of interactive input at a time against a deck
 * manager and writes human-readable output. Engine errors that a player
 * can recover from are reported and the session carries on.
 */

import { EmptyDeckError, UnknownDeckError } from '../decks/errors.js';
import type { Deck } from '../decks/Deck.js';
import type { DeckManager } from '../decks/DeckManager.js';
import type { Logger } from '../utils/Logger.js';

export type OutputWriter = (line: string) => void;

export interface DeckSessionOptions {
  output: OutputWriter;
  /** Deck selected at start; defaults to the first registered deck */
  activeDeckId?: string;
  logger?: Logger;
}

export interface CommandResult {
  /** False once the player asked to leave */
  continue: boolean;
}

/** Most cards one `draw n` may take from a reshuffling deck */
export const MAX_DRAW_COUNT = 100;

export const HELP_LINES: readonly string[] = [
  'Available commands:',
  '  d, draw [n]  - Draw a random card (or n cards) from the active deck',
  '  r, reset     - Reset the active deck to its original state',
  '  s, status    - Show the state of all loaded decks',
  '  l, list      - List loaded decks',
  '  u, use <id>  - Make <id> the active deck',
  '  h, ?, help   - Show this help message',
  '  q, quit      - Quit the application',
];

export class DeckSession {
  private manager: DeckManager;
  private output: OutputWriter;
  private logger?: Logger;
  private activeDeckId?: string;

  constructor(manager: DeckManager, options: DeckSessionOptions) {
    this.manager = manager;
    this.output = options.output;
    this.logger = options.logger;
    this.activeDeckId = options.activeDeckId ?? manager.listDeckIds()[0];
    if (this.activeDeckId !== undefined) {
      // fail fast on a bad starting selection
      manager.getDeck(this.activeDeckId);
    }
  }

  getActiveDeckId(): string | undefined {
    return this.activeDeckId;
  }

  execute(line: string): CommandResult {
    const [rawCommand = '', ...args] = line.trim().split(/\s+/);
    const command = rawCommand.toLowerCase();
    this.logger?.debug(`Command: ${command || '<empty>'}`, args.length > 0 ? { args } : undefined);

    switch (command) {
      case '':
        break;
      case 'd':
      case 'draw':
        this.draw(args[0]);
        break;
      case 'r':
      case 'reset':
        this.reset();
        break;
      case 's':
      case 'status':
        this.status();
        break;
      case 'l':
      case 'list':
        this.list();
        break;
      case 'u':
      case 'use':
        this.use(args[0]);
        break;
      case 'h':
      case '?':
      case 'help':
        HELP_LINES.forEach((helpLine) => this.output(helpLine));
        break;
      case 'q':
      case 'quit':
      case 'exit':
        this.output('Goodbye!');
        return { continue: false };
      default:
        this.output(`Unknown command: ${command}`);
        this.output("Type 'h' or '?' for help");
    }

    return { continue: true };
  }

  private activeDeck(): Deck | undefined {
    if (this.activeDeckId === undefined) {
      this.output('No deck selected');
      return undefined;
    }
    return this.manager.getDeck(this.activeDeckId);
  }

  private draw(countArg?: string): void {
    const deck = this.activeDeck();
    if (!deck) return;

    if (countArg !== undefined) {
      const count = Number(countArg);
      if (!Number.isInteger(count) || count <= 0) {
        this.output(`Error: draw count must be a positive integer, got "${countArg}"`);
        return;
      }
      if (deck.reshuffle && count > MAX_DRAW_COUNT) {
        this.output(`Error: draw count must be at most ${MAX_DRAW_COUNT}, got "${countArg}"`);
        return;
      }
      // a deck that does not reshuffle can only give what it holds
      const drawn = deck.drawMany(deck.reshuffle ? count : Math.min(count, deck.remaining()));
      if (drawn.length === 0) {
        this.output('The deck is empty!');
      } else {
        this.output(`Drew: ${drawn.join(', ')}`);
      }
      this.printDeckStatus(deck);
      return;
    }

    try {
      const outcome = deck.drawWithDetail();
      if (outcome.reshuffled) {
        this.output(`${deck.id ? `Deck ${deck.id}` : 'Deck'} was empty and has been reshuffled`);
      }
      this.output(`Drew: ${outcome.card}`);
    } catch (error) {
      if (!(error instanceof EmptyDeckError)) {
        throw error;
      }
      this.output('The deck is empty!');
    }
    this.printDeckStatus(deck);
  }

  private reset(): void {
    const deck = this.activeDeck();
    if (!deck) return;

    deck.reset();
    this.output('Deck reset to original state');
    this.printDeckStatus(deck);
  }

  private status(): void {
    this.output('Status of all loaded decks:');
    const decks = this.manager.status();
    if (decks.length === 0) {
      this.output('  No decks loaded');
      return;
    }

    for (const deck of decks) {
      const marker = deck.id === this.activeDeckId ? '*' : ' ';
      const reshuffle = deck.reshuffle ? ' (reshuffles)' : '';
      this.output(`${marker} ${deck.id ?? ''}: ${deck.totalRemaining}/${deck.totalCount} cards remaining${reshuffle}`);
      for (const entry of deck.entries) {
        this.output(`    ${entry.name}: ${entry.remainingCount}/${entry.originalCount}`);
      }
    }
  }

  private list(): void {
    const ids = this.manager.listDeckIds();
    if (ids.length === 0) {
      this.output('No decks loaded');
      return;
    }
    for (const id of ids) {
      this.output(`${id === this.activeDeckId ? '*' : ' '} ${id}`);
    }
  }

  private use(id?: string): void {
    if (id === undefined) {
      this.output('Usage: u <deck-id>');
      return;
    }

    try {
      this.manager.getDeck(id);
    } catch (error) {
      if (!(error instanceof UnknownDeckError)) {
        throw error;
      }
      this.output(`Error: ${error.message}`);
      return;
    }

    this.activeDeckId = id;
    this.output(`Active deck: ${id}`);
  }

  private printDeckStatus(deck: Deck): void {
    this.output(`Deck contains ${deck.remaining()} cards`);
    const drawn = deck.drawn();
    if (drawn.length > 0) {
      this.output(`Drawn cards: ${drawn.join(', ')}`);
    }
  }
}
