/**
 * Round-robin Tournament
 *
 * Measures test agents against a roster of reference opponents. Each round
 * of a match draws two random opening moves and plays them out twice, once
 * with each agent moving first, so neither side profits from a lucky start.
 */

import type { GameAgent } from '../ai/agent'
import {
  type GameState,
  type Move,
  type Player,
  applyMove,
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
  createGameState,
  getLegalMoves,
} from '../game/isolation'
import { type GameEndReason, DEFAULT_TIME_LIMIT, playGame } from '../game/match'
import { type Rng, mulberry32, pickOne } from '../lib/rng'
import { type AgentRating, EloTable } from './elo'

// ============================================================================
// TYPES
// ============================================================================

export interface TournamentOptions {
  /** Rounds per pairing; every round is two games */
  numMatches: number
  /** Milliseconds per move */
  timeLimit: number
  width: number
  height: number
  seed: number
  verbose?: boolean
  /** Clock override, mainly for tests */
  now?: () => number
}

export const DEFAULT_TOURNAMENT_OPTIONS: Omit<TournamentOptions, 'seed'> = {
  numMatches: 5,
  timeLimit: DEFAULT_TIME_LIMIT,
  width: DEFAULT_WIDTH,
  height: DEFAULT_HEIGHT,
}

export interface GameRecord {
  /** Agent moving first after the opening */
  firstPlayer: string
  secondPlayer: string
  winner: string
  loser: string
  reason: GameEndReason
  opening: Move[]
  moves: Move[]
}

export interface MatchResult {
  testAgent: string
  opponent: string
  wins: number
  losses: number
  games: GameRecord[]
}

export interface AgentSummary {
  name: string
  matches: MatchResult[]
  wins: number
  losses: number
  winRate: number
}

export interface TournamentResult {
  numMatches: number
  timeLimit: number
  width: number
  height: number
  seed: number
  agents: AgentSummary[]
  ratings: AgentRating[]
}

// ============================================================================
// MATCHES
// ============================================================================

/**
 * Plays random moves for both players to open a game.
 */
function randomOpening(width: number, height: number, rng: Rng): { state: GameState; opening: Move[] } {
  let state = createGameState(width, height)
  const opening: Move[] = []

  for (let i = 0; i < 2; i++) {
    const move = pickOne(getLegalMoves(state), rng)
    const next = applyMove(state, move)
    if (next === null) {
      throw new Error(`Opening move (${move[0]}, ${move[1]}) was rejected`)
    }
    opening.push(move)
    state = next
  }

  return { state, opening }
}

/**
 * Plays numMatches rounds between a test agent and an opponent.
 */
export async function playMatch(
  testAgent: GameAgent,
  opponent: GameAgent,
  options: TournamentOptions,
  rng: Rng
): Promise<MatchResult> {
  const result: MatchResult = {
    testAgent: testAgent.name,
    opponent: opponent.name,
    wins: 0,
    losses: 0,
    games: [],
  }

  for (let round = 0; round < options.numMatches; round++) {
    const { state, opening } = randomOpening(options.width, options.height, rng)

    const seatings: Array<{ agents: Record<Player, GameAgent>; testSeat: Player }> = [
      { agents: { 1: testAgent, 2: opponent }, testSeat: 1 },
      { agents: { 1: opponent, 2: testAgent }, testSeat: 2 },
    ]

    for (const { agents, testSeat } of seatings) {
      const outcome = await playGame(state, agents, {
        timeLimit: options.timeLimit,
        now: options.now,
      })

      if (outcome.winner === testSeat) {
        result.wins++
      } else {
        result.losses++
      }

      result.games.push({
        firstPlayer: agents[1].name,
        secondPlayer: agents[2].name,
        winner: agents[outcome.winner].name,
        loser: agents[outcome.loser].name,
        reason: outcome.reason,
        opening,
        moves: outcome.moveHistory,
      })
    }
  }

  return result
}

// ============================================================================
// TOURNAMENT
// ============================================================================

/**
 * Names that occur more than once, in order of their second appearance.
 */
export function findRepeatedNames(names: string[]): string[] {
  const seen = new Set<string>()
  const repeated = new Set<string>()
  for (const name of names) {
    if (seen.has(name)) {
      repeated.add(name)
    }
    seen.add(name)
  }
  return Array.from(repeated)
}

/**
 * Plays every test agent against every opponent.
 *
 * @throws Error if two agents share a name
 */
export async function runTournament(
  testAgents: GameAgent[],
  opponents: GameAgent[],
  options: TournamentOptions
): Promise<TournamentResult> {
  const repeated = findRepeatedNames([...testAgents, ...opponents].map((a) => a.name))
  if (repeated.length > 0) {
    throw new Error(`Each agent may appear only once, repeated: ${repeated.join(', ')}`)
  }

  const rng = mulberry32(options.seed)
  const elo = new EloTable()
  const agents: AgentSummary[] = []

  for (const testAgent of testAgents) {
    const summary: AgentSummary = { name: testAgent.name, matches: [], wins: 0, losses: 0, winRate: 0 }

    if (options.verbose) {
      console.log(`[tournament] Evaluating ${testAgent.name}: ${testAgent.description}`)
    }

    for (const opponent of opponents) {
      const match = await playMatch(testAgent, opponent, options, rng)

      for (const game of match.games) {
        elo.recordGame(game.winner, game.loser)
      }

      summary.matches.push(match)
      summary.wins += match.wins
      summary.losses += match.losses

      if (options.verbose) {
        console.log(`[tournament] ${testAgent.name} vs ${opponent.name}: ${match.wins}-${match.losses}`)
      }
    }

    const played = summary.wins + summary.losses
    summary.winRate = played > 0 ? summary.wins / played : 0
    agents.push(summary)
  }

  return {
    numMatches: options.numMatches,
    timeLimit: options.timeLimit,
    width: options.width,
    height: options.height,
    seed: options.seed,
    agents,
    ratings: elo.standings(),
  }
}
