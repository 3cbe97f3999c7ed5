import { describe, it, expect, vi, afterEach } from 'vitest'
import { playGame } from './match'
import { replayMoves, type GameState, type Move } from './isolation'
import type { GameAgent, MoveResult } from '../ai/agent'

function stateFrom(moves: Move[], width = 7, height = 7): GameState {
  const state = replayMoves(moves, width, height)
  if (state === null) throw new Error('Illegal test position')
  return state
}

function scriptedAgent(
  name: string,
  pick: (state: GameState, legalMoves: Move[]) => MoveResult | Promise<MoveResult>
): GameAgent {
  return {
    name,
    description: 'test agent',
    selectMove: async (state, legalMoves) => pick(state, legalMoves),
  }
}

const firstLegal = (name: string) =>
  scriptedAgent(name, (_state, legalMoves) => ({ move: legalMoves[0] ?? null }))

// 3x3 board: player 1 in a corner, player 2 in the opposite corner
const cycleStart = stateFrom(
  [
    [0, 0],
    [2, 2],
  ],
  3,
  3
)

describe('playGame', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('plays until the player to move is stuck', async () => {
    const outcome = await playGame(cycleStart, { 1: firstLegal('a'), 2: firstLegal('b') })

    expect(outcome.winner).toBe(1)
    expect(outcome.loser).toBe(2)
    expect(outcome.reason).toBe('no-legal-moves')
    expect(outcome.moveHistory).toEqual([
      [1, 2],
      [0, 1],
      [2, 0],
    ])
    expect(outcome.finalState.activePlayer).toBe(2)
  })

  it('loses on time when a move comes back late', async () => {
    let clock = 0
    const slow = scriptedAgent('slow', (_state, legalMoves) => {
      clock += 200
      return { move: legalMoves[0] }
    })

    const outcome = await playGame(
      cycleStart,
      { 1: slow, 2: firstLegal('b') },
      { timeLimit: 150, now: () => clock }
    )

    expect(outcome).toMatchObject({ winner: 2, loser: 1, reason: 'timeout', moveHistory: [] })
  })

  it('hands agents a clock counting down from the time limit', async () => {
    let clock = 1000
    const seen: number[] = []
    const watcher: GameAgent = {
      name: 'watcher',
      description: 'test agent',
      selectMove: async (_state, legalMoves, timeLeft) => {
        seen.push(timeLeft())
        clock += 40
        seen.push(timeLeft())
        return { move: legalMoves[0] }
      },
    }

    await playGame(cycleStart, { 1: watcher, 2: firstLegal('b') }, { timeLimit: 100, now: () => clock })

    expect(seen.slice(0, 2)).toEqual([100, 60])
  })

  it('forfeits an illegal move', async () => {
    const cheat = scriptedAgent('cheat', () => ({ move: [1, 1] }))
    const outcome = await playGame(cycleStart, { 1: cheat, 2: firstLegal('b') })
    expect(outcome).toMatchObject({ winner: 2, reason: 'forfeit' })
  })

  it('forfeits a move off the grid lines', async () => {
    const fractional = scriptedAgent('fractional', () => ({ move: [0.5, 0] }))
    const outcome = await playGame(cycleStart, { 1: fractional, 2: firstLegal('b') })
    expect(outcome).toMatchObject({ winner: 2, loser: 1, reason: 'forfeit', moveHistory: [] })
  })

  it('forfeits when no move is returned', async () => {
    const idle = scriptedAgent('idle', () => ({ move: null }))
    const outcome = await playGame(cycleStart, { 1: firstLegal('a'), 2: idle })
    expect(outcome).toMatchObject({ winner: 1, loser: 2, reason: 'forfeit', moveHistory: [[1, 2]] })
  })

  it('logs and forfeits when an agent throws', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const failure = new Error('boom')
    const broken = scriptedAgent('broken', () => {
      throw failure
    })

    const outcome = await playGame(cycleStart, { 1: broken, 2: firstLegal('b') })

    expect(outcome).toMatchObject({ winner: 2, reason: 'forfeit' })
    expect(errorSpy).toHaveBeenCalledWith('[game:broken]', 'boom', failure)
  })

  it('gives agents a copy of the state', async () => {
    const vandal = scriptedAgent('vandal', (state, legalMoves) => {
      state.board[1][2] = 2
      return { move: legalMoves[0] }
    })

    const outcome = await playGame(cycleStart, { 1: vandal, 2: firstLegal('b') })
    expect(outcome.moveHistory[0]).toEqual([1, 2])
    expect(cycleStart.board[1][2]).toBeNull()
  })
})
