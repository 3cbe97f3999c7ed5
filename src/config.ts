/**
 * Tournament configuration
 *
 * Settings come from command-line flags, then ISOLATION_* environment
 * variables, then defaults, and are validated with zod before anything runs.
 */

import { z } from 'zod'
import {
  CPU_AGENT_NAMES,
  TEST_AGENT_NAMES,
  isAgentPresetName,
  listAgentPresets,
} from './ai/agents'
import { DEFAULT_TOURNAMENT_OPTIONS, findRepeatedNames } from './tournament/tournament'

/** Smallest board a tournament is played on */
const MIN_BOARD_SIZE = 3

// ============================================================================
// SCHEMA
// ============================================================================

const agentNameSchema = z
  .string()
  .refine(isAgentPresetName, (name) => ({
    message: `Unknown agent "${name}". Available: ${listAgentPresets().join(', ')}`,
  }))

// Comma-separated on the command line, arrays when built in code
const agentListSchema = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0)
      : value,
  z.array(agentNameSchema).min(1, 'At least one agent is required')
)

const defaults = DEFAULT_TOURNAMENT_OPTIONS

export const tournamentConfigSchema = z
  .object({
    numMatches: z.coerce.number().int().min(1, 'Matches must be at least 1').default(defaults.numMatches),
    timeLimit: z.coerce.number().int().positive('Time limit must be positive').default(defaults.timeLimit),
    width: z.coerce.number().int().min(MIN_BOARD_SIZE).default(defaults.width),
    height: z.coerce.number().int().min(MIN_BOARD_SIZE).default(defaults.height),
    seed: z.coerce.number().int().nonnegative(),
    testAgents: agentListSchema.default(TEST_AGENT_NAMES),
    opponents: agentListSchema.default(CPU_AGENT_NAMES),
    verbose: z.boolean().default(false),
    json: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    // Ratings and results are keyed by agent name
    const repeated = findRepeatedNames([...config.testAgents, ...config.opponents])
    if (repeated.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Each agent may appear only once, repeated: ${repeated.join(', ')}`,
      })
    }
  })

export type TournamentConfig = z.infer<typeof tournamentConfigSchema>

// ============================================================================
// LOADING
// ============================================================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

type Env = Record<string, string | undefined>

/** First value that was actually given */
function firstGiven(...values: unknown[]): unknown {
  return values.find((value) => value !== undefined && value !== '')
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Resolves the tournament configuration.
 *
 * @param args - Parsed command-line flags (--matches, --time-limit, --width,
 *   --height, --seed, --agents, --opponents, --verbose, --json)
 * @param env - Environment; ISOLATION_MATCHES, ISOLATION_TIME_LIMIT and
 *   ISOLATION_SEED are read
 * @param now - Clock used to pick a seed when none is given
 * @throws ConfigError when any setting is invalid
 */
export function loadTournamentConfig(
  args: Record<string, unknown>,
  env: Env = process.env,
  now: () => number = Date.now
): TournamentConfig {
  const raw = {
    numMatches: firstGiven(args.matches, env.ISOLATION_MATCHES),
    timeLimit: firstGiven(args['time-limit'], env.ISOLATION_TIME_LIMIT),
    width: firstGiven(args.width),
    height: firstGiven(args.height),
    seed: firstGiven(args.seed, env.ISOLATION_SEED) ?? now() >>> 0,
    testAgents: firstGiven(args.agents),
    opponents: firstGiven(args.opponents),
    verbose: args.verbose,
    json: args.json,
  }

  const parsed = tournamentConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}
