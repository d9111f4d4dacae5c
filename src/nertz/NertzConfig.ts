/**
 * Simulation configuration.
 *
 * Values come from environment variables, overlaid by command-line
 * flags, and are validated with Zod. Invalid values throw a ZodError.
 *
 * | Setting        | Env var           | Flag           | Default |
 * | -------------- | ----------------- | -------------- | ------- |
 * | playerCount    | NERTZ_PLAYERS     | --players      | 4       |
 * | seed           | NERTZ_SEED        | --seed         | random  |
 * | logLevel       | NERTZ_LOG_LEVEL   | --log-level    | info    |
 * | maxTurns       | NERTZ_MAX_TURNS   | --max-turns    | 500     |
 * | transcriptPath |                   | --transcript   | none    |
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/** A variable set to the empty string counts as unset. */
function emptyAsUnset(value: unknown): unknown {
  return value === '' ? undefined : value;
}

export const NertzConfigSchema = z.object({
  playerCount: z.preprocess(emptyAsUnset, z.coerce.number().int().min(1).default(4)),
  seed: z.preprocess(emptyAsUnset, z.coerce.number().int().optional()),
  logLevel: z.preprocess(emptyAsUnset, LogLevelSchema.default('info')),
  maxTurns: z.preprocess(emptyAsUnset, z.coerce.number().int().min(1).default(500)),
  /** Where to write the JSON transcript, if anywhere. */
  transcriptPath: z.string().min(1).optional(),
});

export type NertzConfig = z.infer<typeof NertzConfigSchema>;

const ENV_KEYS = {
  playerCount: 'NERTZ_PLAYERS',
  seed: 'NERTZ_SEED',
  logLevel: 'NERTZ_LOG_LEVEL',
  maxTurns: 'NERTZ_MAX_TURNS',
} as const;

const CLI_FLAGS: Record<string, keyof NertzConfig> = {
  '--players': 'playerCount',
  '--seed': 'seed',
  '--log-level': 'logLevel',
  '--max-turns': 'maxTurns',
  '--transcript': 'transcriptPath',
};

/**
 * Read the configuration from environment variables. Unset variables
 * take their defaults.
 */
export function loadNertzConfig(env: NodeJS.ProcessEnv = process.env): NertzConfig {
  return NertzConfigSchema.parse({
    playerCount: env[ENV_KEYS.playerCount],
    seed: env[ENV_KEYS.seed],
    logLevel: env[ENV_KEYS.logLevel],
    maxTurns: env[ENV_KEYS.maxTurns],
  });
}

/**
 * Overlay command-line flags (`--players 3` or `--players=3`) on a
 * base configuration.
 *
 * @throws Error for an unknown flag or a flag without a value.
 */
export function parseCliArgs(argv: readonly string[], base: NertzConfig): NertzConfig {
  const raw: Record<string, unknown> = { ...base };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    const key = CLI_FLAGS[flag];
    if (key === undefined) {
      throw new Error(`Unknown option: ${flag}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    raw[key] = value;
  }

  return NertzConfigSchema.parse(raw);
}
