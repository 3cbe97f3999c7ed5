/**
 * Baseline Agents
 *
 * Cheap opponents without tree search, used to anchor tournament results.
 *
 * Agents:
 * - RandomAgent: uniform choice among legal moves
 * - GreedyAgent: one-ply lookahead on an evaluation function
 */

import type { GameAgent, MoveResult } from '../agent'
import { type GameState, type Move, type Player, applyMove } from '../../game/isolation'
import { type EvaluationFunction, type EvaluationName, getEvaluationFunction } from '../evaluation'
import { type Rng, pickOne } from '../../lib/rng'

// ============================================================================
// RANDOM AGENT
// ============================================================================

export class RandomAgent implements GameAgent {
  readonly name: string
  readonly description = 'Picks uniformly among legal moves'

  private rng: Rng

  constructor(name = 'random', rng: Rng = Math.random) {
    this.name = name
    this.rng = rng
  }

  async selectMove(_state: GameState, legalMoves: Move[]): Promise<MoveResult> {
    if (legalMoves.length === 0) {
      return { move: null }
    }
    return { move: pickOne(legalMoves, this.rng) }
  }
}

// ============================================================================
// GREEDY AGENT
// ============================================================================

export class GreedyAgent implements GameAgent {
  readonly name: string
  readonly description: string

  private evaluate: EvaluationFunction

  constructor(name = 'greedy', evaluation: EvaluationName = 'open') {
    this.name = name
    this.evaluate = getEvaluationFunction(evaluation)
    this.description = `Plays the move with the best ${evaluation} score one ply ahead`
  }

  async selectMove(state: GameState, legalMoves: Move[]): Promise<MoveResult> {
    const player = state.activePlayer
    let bestMove: Move | null = null
    let bestScore = -Infinity

    for (const move of legalMoves) {
      const next = applyMove(state, move)
      if (next === null) continue

      const score = this.evaluate(next, player)
      if (bestMove === null || score > bestScore) {
        bestMove = move
        bestScore = score
      }
    }

    return bestMove === null ? { move: null } : { move: bestMove, score: bestScore }
  }

  evaluatePosition(state: GameState, player: Player): number {
    return this.evaluate(state, player)
  }
}
