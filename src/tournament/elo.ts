/**
 * Elo ratings for tournament agents
 *
 * Standard Elo update with a variable K-factor:
 * - K=32 while an agent has played fewer than 30 games
 * - K=16 once it is established
 *
 * Isolation has no draws, so every game has a winner and a loser.
 */

/** Starting rating for every agent */
export const DEFAULT_RATING = 1200

const K_FACTOR_NEW = 32
const K_FACTOR_ESTABLISHED = 16
const ESTABLISHED_GAMES_THRESHOLD = 30

/** Ratings never drop below this */
const RATING_FLOOR = 100

export interface AgentRating {
  name: string
  rating: number
  gamesPlayed: number
}

export function getKFactor(gamesPlayed: number): number {
  return gamesPlayed < ESTABLISHED_GAMES_THRESHOLD ? K_FACTOR_NEW : K_FACTOR_ESTABLISHED
}

/**
 * Probability of winning against the opponent:
 *
 * E = 1 / (1 + 10^((opponentRating - rating) / 400))
 */
export function expectedScore(rating: number, opponentRating: number): number {
  return 1 / (1 + 10 ** ((opponentRating - rating) / 400))
}

/**
 * Running ratings for a set of agents, keyed by agent name.
 */
export class EloTable {
  private ratings: Map<string, AgentRating> = new Map()

  constructor(private readonly initialRating = DEFAULT_RATING) {}

  get(name: string): AgentRating {
    return this.ratings.get(name) ?? { name, rating: this.initialRating, gamesPlayed: 0 }
  }

  /**
   * Applies the result of one game. Both updates use the pre-game ratings.
   */
  recordGame(winner: string, loser: string): void {
    const w = this.get(winner)
    const l = this.get(loser)

    this.ratings.set(winner, this.update(w, l.rating, 1))
    this.ratings.set(loser, this.update(l, w.rating, 0))
  }

  /**
   * Ratings from highest to lowest, ties broken by name.
   */
  standings(): AgentRating[] {
    return Array.from(this.ratings.values()).sort(
      (a, b) => b.rating - a.rating || a.name.localeCompare(b.name)
    )
  }

  private update(entry: AgentRating, opponentRating: number, actualScore: number): AgentRating {
    const change = Math.round(
      getKFactor(entry.gamesPlayed) * (actualScore - expectedScore(entry.rating, opponentRating))
    )
    return {
      name: entry.name,
      rating: Math.max(RATING_FLOOR, entry.rating + change),
      gamesPlayed: entry.gamesPlayed + 1,
    }
  }
}
