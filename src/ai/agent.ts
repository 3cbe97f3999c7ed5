/**
 * Game Agent Abstraction
 *
 * Common interface for everything that can take a turn in a game of
 * Isolation: tree-search agents, one-ply greedy agents and random movers.
 */

import type { GameState, Move, Player } from '../game/isolation'
import type { TimeLeft } from './search'

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Result returned from move selection.
 */
export interface MoveResult {
  /** Selected move, or null when the agent has nothing to play */
  move: Move | null
  /** Score of the selected move from the agent's perspective, if known */
  score?: number
  /** Optional search statistics */
  searchInfo?: SearchInfo
}

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Deepest fully completed search depth */
  depth: number
  /** Number of positions visited */
  nodesSearched: number
  /** Time spent on move selection (ms) */
  timeUsed: number
  /** Whether the search was cut short by the clock */
  timedOut?: boolean
}

/**
 * Pluggable agent interface.
 *
 * Agents keep no game-to-game memory. The game runner hands each agent its
 * own copy of the state, so an agent may explore it freely.
 */
export interface GameAgent {
  /** Agent identifier, used in tournament tables */
  readonly name: string

  /** Human-readable description */
  readonly description: string

  /**
   * Select a move for the active player.
   *
   * @param state - Current game state
   * @param legalMoves - Moves available to the active player
   * @param timeLeft - Milliseconds left in the turn; returning after it hits
   *   zero loses the game
   */
  selectMove(state: GameState, legalMoves: Move[], timeLeft: TimeLeft): Promise<MoveResult>

  /**
   * Static evaluation from the given player's perspective.
   * Optional - not every agent scores positions.
   */
  evaluatePosition?(state: GameState, player: Player): number
}
