/**
 * Deck Errors
 *
 * Failures raised by the deck engine and the definition loader.
 */

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid deck definition: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class EmptyDeckError extends Error {
  readonly deckId?: string;

  constructor(deckId?: string) {
    super(deckId ? `Deck is empty: ${deckId}` : 'Deck is empty');
    this.name = 'EmptyDeckError';
    this.deckId = deckId;
  }
}

export class DuplicateDeckError extends Error {
  readonly deckId: string;

  constructor(deckId: string) {
    super(`Deck already exists: ${deckId}`);
    this.name = 'DuplicateDeckError';
    this.deckId = deckId;
  }
}

export class UnknownDeckError extends Error {
  readonly deckId: string;

  constructor(deckId: string) {
    super(`Deck not found: ${deckId}`);
    this.name = 'UnknownDeckError';
    this.deckId = deckId;
  }
}

export class UnknownCardError extends Error {
  readonly cardName: string;

  constructor(cardName: string) {
    super(`Card not in deck: ${cardName}`);
    this.name = 'UnknownCardError';
    this.cardName = cardName;
  }
}

export class DeckFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${filePath}`, options);
    this.name = 'DeckFileError';
    this.filePath = filePath;
  }
}
