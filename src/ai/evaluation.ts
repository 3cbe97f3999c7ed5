/**
 * Evaluation Functions
 *
 * Heuristics that score a non-terminal Isolation position from one player's
 * point of view. Search agents call them at the leaves of the game tree.
 */

import {
  type GameState,
  type Move,
  type Player,
  getBlankSpaces,
  getLegalMoves,
  getOpponent,
  isLoser,
  isWinner,
} from '../game/isolation'

export type EvaluationFunction = (state: GameState, player: Player) => number

// Opponent mobility counts double in the move-difference heuristics
const PLAYER_FACTOR = 1
const OPPONENT_FACTOR = 2

// ============================================================================
// BASELINE SCORES
// ============================================================================

/**
 * Only distinguishes won and lost positions.
 */
export function nullScore(state: GameState, player: Player): number {
  if (isLoser(state, player)) return -Infinity
  if (isWinner(state, player)) return Infinity
  return 0
}

/**
 * Number of moves available to the player.
 */
export function openMoveScore(state: GameState, player: Player): number {
  if (isLoser(state, player)) return -Infinity
  if (isWinner(state, player)) return Infinity
  return getLegalMoves(state, player).length
}

/**
 * Difference between the player's and the opponent's move counts.
 */
export function improvedScore(state: GameState, player: Player): number {
  if (isLoser(state, player)) return -Infinity
  if (isWinner(state, player)) return Infinity
  const own = getLegalMoves(state, player).length
  const opp = getLegalMoves(state, getOpponent(player)).length
  return own - opp
}

// ============================================================================
// TUNED HEURISTICS
// ============================================================================

/**
 * Ratio of player moves to opponent moves.
 */
export function calcRatioOfMoves(state: GameState, player: Player): number {
  const playerMoves = getLegalMoves(state, player)
  const oppMoves = getLegalMoves(state, getOpponent(player))

  if (oppMoves.length === 0) return Infinity
  if (playerMoves.length === 0) return -Infinity

  return playerMoves.length / oppMoves.length
}

/**
 * Move difference where the player's mobility grows in weight as the board
 * fills up, and opponent moves are penalised at twice the rate.
 */
export function calcMoveDiffWithSpaces(state: GameState, player: Player): number {
  const playerMoves = getLegalMoves(state, player)
  const oppMoves = getLegalMoves(state, getOpponent(player))

  if (oppMoves.length === 0) return Infinity
  if (playerMoves.length === 0) return -Infinity

  const openSpaces = getBlankSpaces(state).length
  const totalSpaces = state.width * state.height

  return (
    PLAYER_FACTOR * playerMoves.length * (totalSpaces / openSpaces) -
    OPPONENT_FACTOR * oppMoves.length
  )
}

/**
 * Weight of a move by its distance to the board centre:
 * 1 at the centre, falling off linearly with Euclidean distance.
 */
export function centerWeight(state: GameState, move: Move): number {
  const centerRow = Math.floor(state.height / 2)
  const centerCol = Math.floor(state.width / 2)
  const distance = Math.sqrt((centerRow - move[0]) ** 2 + (centerCol - move[1]) ** 2)
  return 1 - distance / state.width
}

/**
 * Move difference where moves toward the centre count more than moves on
 * the edge of the board.
 */
export function calcMoveDiffFromCenter(state: GameState, player: Player): number {
  const playerMoves = getLegalMoves(state, player)
  const oppMoves = getLegalMoves(state, getOpponent(player))

  if (oppMoves.length === 0) return Infinity
  if (playerMoves.length === 0) return -Infinity

  const playerScore = playerMoves.reduce((sum, move) => sum + centerWeight(state, move), 0)
  const oppScore = oppMoves.reduce((sum, move) => sum + centerWeight(state, move), 0)

  return PLAYER_FACTOR * playerScore - OPPONENT_FACTOR * oppScore
}

/**
 * Default heuristic for the search agent.
 */
export const customScore: EvaluationFunction = calcMoveDiffFromCenter

// ============================================================================
// REGISTRY
// ============================================================================

export const EVALUATION_NAMES = [
  'null',
  'open',
  'improved',
  'ratio-of-moves',
  'move-diff-with-spaces',
  'move-diff-from-center',
  'custom',
] as const

export type EvaluationName = (typeof EVALUATION_NAMES)[number]

export const EVALUATION_FUNCTIONS: Record<EvaluationName, EvaluationFunction> = {
  null: nullScore,
  open: openMoveScore,
  improved: improvedScore,
  'ratio-of-moves': calcRatioOfMoves,
  'move-diff-with-spaces': calcMoveDiffWithSpaces,
  'move-diff-from-center': calcMoveDiffFromCenter,
  custom: customScore,
}

export function isEvaluationName(name: string): name is EvaluationName {
  return Object.hasOwn(EVALUATION_FUNCTIONS, name)
}

/**
 * Looks up an evaluation function by name.
 *
 * @throws Error if the name is not registered
 */
export function getEvaluationFunction(name: string): EvaluationFunction {
  if (!isEvaluationName(name)) {
    throw new Error(
      `Unknown evaluation function "${name}". Available: ${EVALUATION_NAMES.join(', ')}`
    )
  }
  return EVALUATION_FUNCTIONS[name]
}
