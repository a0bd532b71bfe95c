import * as dotenv from 'dotenv';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { isLogLevel } from '../utils/Logger.js';
import type { LogLevel } from '../utils/Logger.js';

export interface EnvConfig {
  /** Definition file or directory of definition files */
  cardsPath: string;
  /** Seed for a reproducible draw sequence; unset means crypto randomness */
  seed?: number;
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  cardsPath?: string;
  seed?: string;
  logLevel?: string;
}

export interface RawEnvConfig {
  cardsPath: string;
  seed?: string;
  logLevel: string;
}

export const DEFAULT_CARDS_PATH = 'data/cards.json';

export function loadEnvConfig(
  cliOverrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): RawEnvConfig {
  const envPath = path.resolve(process.cwd(), '.env');
  if (env === process.env && fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }

  return {
    cardsPath: cliOverrides.cardsPath ?? env.CARD_DECK_PATH ?? DEFAULT_CARDS_PATH,
    seed: cliOverrides.seed ?? env.CARD_DECK_SEED,
    logLevel: cliOverrides.logLevel ?? env.CARD_DECK_LOG_LEVEL ?? 'info',
  };
}

export function validateConfig(raw: RawEnvConfig): { valid: boolean; errors: string[]; config?: EnvConfig } {
  const errors: string[] = [];

  let seed: number | undefined;
  if (raw.seed !== undefined && raw.seed.trim() !== '') {
    const parsed = Number(raw.seed);
    if (Number.isSafeInteger(parsed)) {
      seed = parsed;
    } else {
      errors.push(`CARD_DECK_SEED must be an integer, got "${raw.seed}"`);
    }
  }

  if (!isLogLevel(raw.logLevel)) {
    errors.push(`CARD_DECK_LOG_LEVEL must be one of silent, info, debug, got "${raw.logLevel}"`);
  }

  if (raw.cardsPath.trim() === '') {
    errors.push('CARD_DECK_PATH must not be empty');
  }

  if (errors.length > 0 || !isLogLevel(raw.logLevel)) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors,
    config: { cardsPath: raw.cardsPath, seed, logLevel: raw.logLevel },
  };
}

export function printConfigSummary(config: EnvConfig, log: (line: string) => void = console.log): void {
  log(`[CardDeck] Cards: ${config.cardsPath}`);
  log(`[CardDeck] Random: ${config.seed === undefined ? 'crypto' : `seeded (${config.seed})`}`);
  log(`[CardDeck] Log level: ${config.logLevel}`);
}
