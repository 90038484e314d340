import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createLogger } from './logger.js';

const log = createLogger('Config');

export const DEFAULT_CONFIG_PATH = 'challenge-config.json';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const modeEnum = z.enum(['rated', 'casual']);
const sortByEnum = z.enum(['best', 'first']);

export type ChallengeMode = z.infer<typeof modeEnum>;
export type SortMode = z.infer<typeof sortByEnum>;

const nonNegativeInt = z.number().int().min(0);

/** `null` or a missing key means no upper bound. */
const unbounded = z
  .number()
  .min(0)
  .nullish()
  .transform((value) => value ?? Number.POSITIVE_INFINITY);

export const challengePolicySchema = z
  .object({
    variants: z.array(z.string()).default(['standard']),
    timeControls: z.array(z.string()).default(['bullet', 'blitz', 'rapid', 'classical']),
    minIncrement: nonNegativeInt.default(0),
    maxIncrement: nonNegativeInt.default(180),
    minBase: nonNegativeInt.default(0),
    maxBase: nonNegativeInt.default(315_360_000),
    minDays: nonNegativeInt.default(1),
    maxDays: unbounded,
    modes: z.array(modeEnum).default(['casual', 'rated']),
    acceptBot: z.boolean().default(false),
    onlyBot: z.boolean().default(false),
    blockList: z.array(z.string()).default([]),
    allowList: z.array(z.string()).default([]),
    maxRecentBotChallenges: nonNegativeInt.optional(),
    recentBotChallengeAgeSeconds: z.number().positive().default(60),
    sortBy: sortByEnum.default('best'),
    sweepIntervalMs: z.number().int().positive().optional(),
  })
  .strict()
  .refine((c) => c.minIncrement <= c.maxIncrement, {
    message: 'minIncrement must not exceed maxIncrement',
    path: ['minIncrement'],
  })
  .refine((c) => c.minBase <= c.maxBase, {
    message: 'minBase must not exceed maxBase',
    path: ['minBase'],
  })
  .refine((c) => c.minDays <= c.maxDays, {
    message: 'minDays must not exceed maxDays',
    path: ['minDays'],
  });

/** Thresholds and lists that decide which challenges are accepted. */
export type ChallengePolicy = z.output<typeof challengePolicySchema>;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a plain object and fill in defaults.
 * Throws ConfigError listing every invalid key.
 */
export function parseConfig(input: unknown): ChallengePolicy {
  const result = challengePolicySchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid challenge config: ${messages.join('; ')}`);
  }
  return result.data;
}

/**
 * Read the challenge policy from a JSON file.
 * Path priority: argument > CHALLENGE_CONFIG env var > ./challenge-config.json.
 * A missing file yields the defaults; an unreadable or invalid one throws.
 */
export function loadConfig(configPath?: string): ChallengePolicy {
  const resolved = path.resolve(configPath ?? process.env.CHALLENGE_CONFIG ?? DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(resolved)) {
    log.warn('Config file not found, using defaults', { path: resolved });
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read ${resolved}: ${reason}`);
  }

  const policy = parseConfig(raw);
  log.info('Loaded challenge config', { path: resolved, variants: policy.variants, timeControls: policy.timeControls });
  return policy;
}
