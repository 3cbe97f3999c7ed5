import minimist from 'minimist'
import { createAgentFromPreset } from './ai/agents'
import { loadTournamentConfig } from './config'
import { mulberry32 } from './lib/rng'
import { logError } from './lib/errorUtils'
import { runTournament } from './tournament/tournament'
import { formatTournamentReport } from './tournament/report'

export const USAGE = `Usage: isolation-tournament [options]

Options:
  --matches <n>       Rounds per pairing, two games each (default 5, env ISOLATION_MATCHES)
  --time-limit <ms>   Time per move in milliseconds (default 150, env ISOLATION_TIME_LIMIT)
  --width <n>         Board width (default 7)
  --height <n>        Board height (default 7)
  --seed <n>          Seed for openings and random agents (env ISOLATION_SEED)
  --agents <list>     Comma-separated agents to evaluate (default ID_Improved,Student)
  --opponents <list>  Comma-separated reference opponents
  --json              Print the full result as JSON
  --verbose           Log progress while playing
  -h, --help          Show this help`

/**
 * Runs the tournament CLI and resolves with the process exit code.
 */
export async function main(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const args = minimist(argv, {
    boolean: ['json', 'verbose', 'help'],
    string: ['agents', 'opponents'],
    alias: { h: 'help' },
  })

  if (args.help) {
    console.log(USAGE)
    return 0
  }

  try {
    const config = loadTournamentConfig(args, env)

    // Random agents draw from their own stream so openings stay tied to the seed
    const agentRng = mulberry32(config.seed + 1)
    const testAgents = config.testAgents.map((name) => createAgentFromPreset(name, agentRng))
    const opponents = config.opponents.map((name) => createAgentFromPreset(name, agentRng))

    const result = await runTournament(testAgents, opponents, {
      numMatches: config.numMatches,
      timeLimit: config.timeLimit,
      width: config.width,
      height: config.height,
      seed: config.seed,
      verbose: config.verbose,
    })

    console.log(config.json ? JSON.stringify(result, null, 2) : formatTournamentReport(result))
    return 0
  } catch (err) {
    logError('isolation-tournament', err)
    return 1
  }
}
