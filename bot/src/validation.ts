import { z } from 'zod';

// ---------------------------------------------------------------------------
// Player profile (challenger, destUser, white, black)
// ---------------------------------------------------------------------------

export const profileSchema = z.object({
  name: z.string().nullish(),
  title: z.string().nullish(),
  rating: z.number().int().nullish(),
  provisional: z.boolean().nullish(),
  aiLevel: z.number().int().nullish(),
});

export type ProfileRecord = z.infer<typeof profileSchema>;

// ---------------------------------------------------------------------------
// Own account profile
// ---------------------------------------------------------------------------

export const ownProfileSchema = z.object({
  username: z.string().min(1),
});

export type OwnProfile = z.infer<typeof ownProfileSchema>;

// ---------------------------------------------------------------------------
// Incoming challenge
// ---------------------------------------------------------------------------

export const challengeSchema = z.object({
  id: z.string().min(1),
  rated: z.boolean(),
  variant: z.object({ key: z.string().min(1) }),
  perf: z.object({ name: z.string() }),
  speed: z.string(),
  timeControl: z
    .object({
      increment: z.number().int().nullish(),
      limit: z.number().int().nullish(),
      daysPerTurn: z.number().int().nullish(),
    })
    .nullish(),
  challenger: profileSchema.nullish(),
  destUser: profileSchema.nullish(),
});

export type ChallengeRecord = z.infer<typeof challengeSchema>;

// ---------------------------------------------------------------------------
// Game start (gameFull)
// ---------------------------------------------------------------------------

export const gameSchema = z.object({
  id: z.string().min(1),
  speed: z.string().nullish(),
  clock: z
    .object({
      initial: z.number().int().nullish(),
      increment: z.number().int().nullish(),
    })
    .nullish(),
  perf: z.object({ name: z.string().nullish() }).nullish(),
  variant: z.object({ name: z.string().min(1) }),
  rated: z.boolean().nullish(),
  white: profileSchema.nullish(),
  black: profileSchema.nullish(),
  initialFen: z.string().nullish(),
  state: z.object({ status: z.string().nullish() }).nullish(),
});

export type GameRecord = z.infer<typeof gameSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export class RecordValidationError extends Error {
  constructor(
    readonly record: string,
    readonly issues: string,
  ) {
    super(`Invalid ${record} record: ${issues}`);
    this.name = 'RecordValidationError';
  }
}

/**
 * Validate a raw record against a zod schema.
 * Returns { success: true, data } on valid input, { success: false, error } on invalid.
 */
export function parseRecord<T>(schema: z.ZodSchema<T>, value: unknown):
  { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const messages = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).filter(Boolean);
  return { success: false, error: messages.join('; ') || 'Invalid record' };
}

/** Like {@link parseRecord}, but throws RecordValidationError on invalid input. */
export function requireRecord<T>(schema: z.ZodSchema<T>, value: unknown, record: string): T {
  const parsed = parseRecord(schema, value);
  if (!parsed.success) {
    throw new RecordValidationError(record, parsed.error);
  }
  return parsed.data;
}
