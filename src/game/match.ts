/**
 * Game Runner
 *
 * Plays one game of Isolation between two agents under a per-move time
 * limit, and reports who won and why.
 */

import type { GameAgent } from '../ai/agent'
import { logError } from '../lib/errorUtils'
import {
  type GameState,
  type Move,
  type Player,
  applyMove,
  getLegalMoves,
  getOpponent,
} from './isolation'

export const DEFAULT_TIME_LIMIT = 150

/**
 * Why a game ended:
 * - no-legal-moves: the player to move was stuck
 * - timeout: the player returned a move after its turn clock expired
 * - forfeit: the player returned an illegal move, or none, or failed
 */
export type GameEndReason = 'no-legal-moves' | 'timeout' | 'forfeit'

export interface GameOutcome {
  winner: Player
  loser: Player
  reason: GameEndReason
  /** Moves played in order, starting from the initial state given */
  moveHistory: Move[]
  finalState: GameState
}

export interface PlayGameOptions {
  /** Milliseconds each agent has per move */
  timeLimit?: number
  /** Clock in milliseconds; injectable for tests */
  now?: () => number
  /** Log each move as it is played */
  verbose?: boolean
}

function endGame(state: GameState, reason: GameEndReason, moveHistory: Move[]): GameOutcome {
  const loser = state.activePlayer
  return { winner: getOpponent(loser), loser, reason, moveHistory, finalState: state }
}

/**
 * Plays a game to completion.
 *
 * @param state - Starting position (may already contain opening moves)
 * @param agents - Agent controlling each player
 */
export async function playGame(
  state: GameState,
  agents: Record<Player, GameAgent>,
  options: PlayGameOptions = {}
): Promise<GameOutcome> {
  const timeLimit = options.timeLimit ?? DEFAULT_TIME_LIMIT
  const now = options.now ?? Date.now
  const moveHistory: Move[] = []
  let current = state

  for (;;) {
    const agent = agents[current.activePlayer]
    const legalMoves = getLegalMoves(current)

    if (legalMoves.length === 0) {
      return endGame(current, 'no-legal-moves', moveHistory)
    }

    const moveStart = now()
    const timeLeft = () => timeLimit - (now() - moveStart)

    let move: Move | null
    try {
      // Agents get their own copies so nothing they do leaks into the game
      const result = await agent.selectMove(structuredClone(current), legalMoves, timeLeft)
      move = result.move
    } catch (err) {
      logError(`game:${agent.name}`, err)
      return endGame(current, 'forfeit', moveHistory)
    }

    if (timeLeft() < 0) {
      return endGame(current, 'timeout', moveHistory)
    }

    const next = move === null ? null : applyMove(current, move)
    if (move === null || next === null) {
      return endGame(current, 'forfeit', moveHistory)
    }

    moveHistory.push(move)
    current = next

    if (options.verbose) {
      console.log(`[game] ${agent.name} -> (${move[0]}, ${move[1]})`)
    }
  }
}
