/**
 * Game Tree Search
 *
 * Depth-limited minimax, with and without alpha-beta pruning. Both searches
 * poll the turn clock on every node and abort with SearchTimeout once the
 * remaining time drops below the agent's threshold.
 */

import { type GameState, type Move, type Player, applyMove, getLegalMoves } from '../game/isolation'
import type { EvaluationFunction } from './evaluation'

// ============================================================================
// TYPES
// ============================================================================

/**
 * Thrown when the turn clock runs below the timer threshold mid-search.
 */
export class SearchTimeout extends Error {
  constructor() {
    super('Search timed out')
    this.name = 'SearchTimeout'
  }
}

/**
 * Returns the milliseconds left in the current turn.
 */
export type TimeLeft = () => number

export interface SearchContext {
  /** Player the search is run for; leaves are scored from their side */
  player: Player
  evaluate: EvaluationFunction
  timeLeft: TimeLeft
  /** Abort once fewer than this many milliseconds remain */
  timerThreshold: number
  nodesSearched: number
}

export interface SearchResult {
  score: number
  /** Best move at this node, null at leaves */
  move: Move | null
}

export type SearchMethod = 'minimax' | 'alphabeta'

export function createSearchContext(
  player: Player,
  evaluate: EvaluationFunction,
  timeLeft: TimeLeft,
  timerThreshold: number
): SearchContext {
  return { player, evaluate, timeLeft, timerThreshold, nodesSearched: 0 }
}

function checkTime(ctx: SearchContext): void {
  if (ctx.timeLeft() < ctx.timerThreshold) {
    throw new SearchTimeout()
  }
}

// ============================================================================
// MINIMAX
// ============================================================================

/**
 * Plain minimax search.
 *
 * @param depth - Plies left to search; 0 scores the state directly
 * @param maximizingPlayer - Whether this layer picks the highest score
 * @throws SearchTimeout when the clock runs low
 */
export function minimax(
  state: GameState,
  depth: number,
  maximizingPlayer: boolean,
  ctx: SearchContext
): SearchResult {
  checkTime(ctx)
  ctx.nodesSearched++

  const moves = getLegalMoves(state)
  if (depth === 0 || moves.length === 0) {
    return { score: ctx.evaluate(state, ctx.player), move: null }
  }

  let bestScore = maximizingPlayer ? -Infinity : Infinity
  let bestMove = moves[0]

  for (const move of moves) {
    const next = applyMove(state, move)
    if (next === null) continue

    const { score } = minimax(next, depth - 1, !maximizingPlayer, ctx)

    if (maximizingPlayer ? score > bestScore : score < bestScore) {
      bestScore = score
      bestMove = move
    }
  }

  return { score: bestScore, move: bestMove }
}

// ============================================================================
// ALPHA-BETA
// ============================================================================

/**
 * Minimax search with alpha-beta pruning.
 *
 * @param alpha - Score the maximizing side is already guaranteed
 * @param beta - Score the minimizing side is already guaranteed
 * @throws SearchTimeout when the clock runs low
 */
export function alphabeta(
  state: GameState,
  depth: number,
  alpha: number,
  beta: number,
  maximizingPlayer: boolean,
  ctx: SearchContext
): SearchResult {
  checkTime(ctx)
  ctx.nodesSearched++

  const moves = getLegalMoves(state)
  if (depth === 0 || moves.length === 0) {
    return { score: ctx.evaluate(state, ctx.player), move: null }
  }

  let bestMove = moves[0]

  if (maximizingPlayer) {
    let maxScore = -Infinity

    for (const move of moves) {
      const next = applyMove(state, move)
      if (next === null) continue

      const { score } = alphabeta(next, depth - 1, alpha, beta, false, ctx)

      if (score > maxScore) {
        maxScore = score
        bestMove = move
      }

      alpha = Math.max(alpha, maxScore)
      if (beta <= alpha) break
    }

    return { score: maxScore, move: bestMove }
  } else {
    let minScore = Infinity

    for (const move of moves) {
      const next = applyMove(state, move)
      if (next === null) continue

      const { score } = alphabeta(next, depth - 1, alpha, beta, true, ctx)

      if (score < minScore) {
        minScore = score
        bestMove = move
      }

      beta = Math.min(beta, minScore)
      if (beta <= alpha) break
    }

    return { score: minScore, move: bestMove }
  }
}

/**
 * Runs the chosen search from the root, where the searching player moves.
 */
export function searchRoot(
  method: SearchMethod,
  state: GameState,
  depth: number,
  ctx: SearchContext
): SearchResult {
  if (method === 'alphabeta') {
    return alphabeta(state, depth, -Infinity, Infinity, true, ctx)
  }
  return minimax(state, depth, true, ctx)
}
