#!/usr/bin/env node

import * as readline from 'node:readline';
import { loadEnvConfig, validateConfig, printConfigSummary } from './config/env.js';
import type { ConfigOverrides } from './config/env.js';
import { DeckManager } from './decks/DeckManager.js';
import { DeckFileError, ValidationError } from './decks/errors.js';
import { CryptoRandomSource, SeededRandomSource } from './decks/RandomSource.js';
import { loadDecksInto } from './loader/DeckLoader.js';
import { DeckSession } from './cli/DeckSession.js';
import { ConsoleLogger } from './utils/ConsoleLogger.js';

interface ParsedArgs {
  cards?: string;
  seed?: string;
  help: boolean;
  debug: boolean;
}

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    help: false,
    debug: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i]!;

    if (arg === '--debug' || arg === '-d') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--cards' && args[i + 1]) {
      result.cards = args[++i];
    } else if (arg === '--seed' && args[i + 1]) {
      result.seed = args[++i];
    }

    i++;
  }

  return result;
}

function printHelp(): void {
  console.log(`
Random Card Deck

Usage:
  card-deck [options]

Draw cards interactively from one or more decks defined in JSON.

Options:
  --cards <path>          Deck definition file, or a directory of them
                          (default: data/cards.json)
  --seed <int>            Seed the draw order for a reproducible session
  --debug, -d             Enable debug logging
  --help, -h              Show this help

Environment Variables:
  CARD_DECK_PATH          Same as --cards
  CARD_DECK_SEED          Same as --seed
  CARD_DECK_LOG_LEVEL     silent, info or debug (default: info)

Definition file format:
  { "cards": [ { "name": "Grassland", "count": 3 } ], "reshuffle": false }

Examples:
  npm run cli -- --cards data/cards.json
  npm run cli -- --cards data/example_deck --seed 42
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  const overrides: ConfigOverrides = {
    cardsPath: args.cards,
    seed: args.seed,
    logLevel: args.debug ? 'debug' : undefined,
  };
  const checked = validateConfig(loadEnvConfig(overrides));
  if (!checked.valid || !checked.config) {
    for (const error of checked.errors) {
      console.error(`Error: ${error}`);
    }
    process.exit(1);
  }

  const config = checked.config;
  const logger = new ConsoleLogger(config.logLevel);
  if (args.debug) {
    printConfigSummary(config);
  }

  const random = config.seed === undefined ? new CryptoRandomSource() : new SeededRandomSource(config.seed);
  const manager = new DeckManager({ random });

  logger.info(`Loading cards from: ${config.cardsPath}`);
  try {
    loadDecksInto(manager, config.cardsPath, logger);
  } catch (error) {
    if (error instanceof ValidationError) {
      logger.error('Invalid card file format', { issues: error.issues });
      process.exit(1);
    }
    if (error instanceof DeckFileError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  for (const snapshot of manager.status()) {
    logger.info(`Loaded ${snapshot.totalCount} cards into deck ${snapshot.id ?? ''}`);
  }

  const session = new DeckSession(manager, {
    output: (line) => console.log(line),
    logger,
  });

  console.log('Random Card Deck - Interactive Mode');
  console.log(`Active deck: ${session.getActiveDeckId() ?? '<none>'}`);
  console.log("Type 'h' or '?' for help");

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  rl.prompt();
  for await (const line of rl) {
    const result = session.execute(line);
    if (!result.continue) {
      rl.close();
      return;
    }
    rl.prompt();
  }

  console.log('');
  console.log('Goodbye!');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
