/**
 * Search Agent
 *
 * Chooses moves with depth-limited minimax or alpha-beta search, either at a
 * fixed depth or with iterative deepening until the turn clock runs low.
 */

import type { GameAgent, MoveResult } from '../agent'
import { type GameState, type Move, type Player, getBlankSpaces } from '../../game/isolation'
import { type EvaluationFunction, type EvaluationName, getEvaluationFunction } from '../evaluation'
import {
  type SearchMethod,
  type TimeLeft,
  SearchTimeout,
  createSearchContext,
  searchRoot,
} from '../search'

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface SearchAgentConfig {
  /** Plies to search when not deepening iteratively */
  searchDepth: number
  /** Evaluation function used at the leaves */
  evaluation: EvaluationName
  /** Deepen one ply at a time until the clock runs out */
  iterative: boolean
  method: SearchMethod
  /** Milliseconds left in the turn at which search is abandoned */
  timerThreshold: number
}

export const DEFAULT_SEARCH_AGENT_CONFIG: SearchAgentConfig = {
  searchDepth: 3,
  evaluation: 'custom',
  iterative: true,
  method: 'minimax',
  timerThreshold: 3,
}

// ============================================================================
// SEARCH AGENT
// ============================================================================

export class SearchAgent implements GameAgent {
  readonly name: string
  readonly description: string

  private config: SearchAgentConfig
  private evaluate: EvaluationFunction

  constructor(name = 'search', config: Partial<SearchAgentConfig> = {}) {
    this.config = { ...DEFAULT_SEARCH_AGENT_CONFIG, ...config }

    if (!Number.isInteger(this.config.searchDepth) || this.config.searchDepth < 1) {
      throw new Error(`Search depth must be a positive integer, got ${this.config.searchDepth}`)
    }

    this.name = name
    this.evaluate = getEvaluationFunction(this.config.evaluation)
    this.description = this.config.iterative
      ? `Iterative deepening ${this.config.method} with ${this.config.evaluation} evaluation`
      : `Depth ${this.config.searchDepth} ${this.config.method} with ${this.config.evaluation} evaluation`
  }

  getConfig(): SearchAgentConfig {
    return { ...this.config }
  }

  async selectMove(state: GameState, legalMoves: Move[], timeLeft: TimeLeft): Promise<MoveResult> {
    const startTime = Date.now()

    if (legalMoves.length === 0) {
      return {
        move: null,
        searchInfo: { depth: 0, nodesSearched: 0, timeUsed: Date.now() - startTime },
      }
    }

    const ctx = createSearchContext(
      state.activePlayer,
      this.evaluate,
      timeLeft,
      this.config.timerThreshold
    )

    // Fixed-depth search runs a single iteration at searchDepth.
    // Iterative search can never need more plies than there are blank cells.
    const firstDepth = this.config.iterative ? 1 : this.config.searchDepth
    const lastDepth = this.config.iterative
      ? getBlankSpaces(state).length
      : this.config.searchDepth

    let bestMove: Move = legalMoves[0]
    let bestScore: number | undefined
    let depthReached = 0
    let timedOut = false

    try {
      for (let depth = firstDepth; depth <= lastDepth; depth++) {
        const result = searchRoot(this.config.method, state, depth, ctx)

        // The deepest completed iteration is the most informed one
        if (result.move !== null) {
          bestMove = result.move
        }
        bestScore = result.score
        depthReached = depth

        // Won or lost for certain; searching deeper cannot change that
        if (Math.abs(result.score) === Infinity) break
      }
    } catch (err) {
      if (!(err instanceof SearchTimeout)) {
        throw err
      }
      timedOut = true
    }

    return {
      move: bestMove,
      score: bestScore,
      searchInfo: {
        depth: depthReached,
        nodesSearched: ctx.nodesSearched,
        timeUsed: Date.now() - startTime,
        timedOut,
      },
    }
  }

  evaluatePosition(state: GameState, player: Player): number {
    return this.evaluate(state, player)
  }
}
