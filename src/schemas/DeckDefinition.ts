import { z } from 'zod';
import { ValidationError } from '../decks/errors.js';

/**
 * Largest total a deck may hold. Every draw asks a random source for an
 * integer below the total, and node:crypto `randomInt` takes ranges under 2^48.
 */
export const MAX_TOTAL_CARDS = 2 ** 48 - 1;

export const CardTypeEntrySchema = z.object(
  {
    name: z
      .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
      .min(1, 'name must not be empty'),
    count: z
      .number({ required_error: 'count is required', invalid_type_error: 'count must be a number' })
      .int('count must be an integer')
      .positive('count must be positive')
      .max(MAX_TOTAL_CARDS, `count must not exceed ${MAX_TOTAL_CARDS}`),
  },
  { invalid_type_error: 'card entry must be an object' }
);

export const CardTypeEntriesSchema = z
  .array(CardTypeEntrySchema, {
    required_error: 'cards is required',
    invalid_type_error: 'cards must be an array',
  })
  .min(1, 'at least one card type is required')
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    let total = 0;
    entries.forEach((entry, index) => {
      total += entry.count;
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate card name "${entry.name}"`,
          path: [index, 'name'],
        });
      }
      seen.add(entry.name);
    });
    if (total > MAX_TOTAL_CARDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `total card count must not exceed ${MAX_TOTAL_CARDS}`,
      });
    }
  });

export const DeckDefinitionSchema = z.object(
  {
    cards: CardTypeEntriesSchema,
    reshuffle: z.boolean({ invalid_type_error: 'reshuffle must be a boolean' }).optional(),
  },
  { invalid_type_error: 'definition must be an object' }
);

export type CardTypeEntryInput = z.infer<typeof CardTypeEntrySchema>;
export type DeckDefinitionInput = z.infer<typeof DeckDefinitionSchema>;

/**
 * Render zod issues as `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function validateCardTypeEntries(data: unknown): CardTypeEntryInput[] {
  const result = CardTypeEntriesSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

export function validateDeckDefinition(data: unknown): DeckDefinitionInput {
  const result = DeckDefinitionSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

export function isValidDeckDefinition(data: unknown): data is DeckDefinitionInput {
  return DeckDefinitionSchema.safeParse(data).success;
}
