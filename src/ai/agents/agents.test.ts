/**
 * Agent Tests
 */

import { describe, it, expect } from 'vitest'
import {
  AGENT_PRESETS,
  CPU_AGENT_NAMES,
  GreedyAgent,
  RandomAgent,
  SearchAgent,
  TEST_AGENT_NAMES,
  createAgentFromPreset,
  isAgentPresetName,
  listAgentPresets,
} from './index'
import {
  createGameState,
  getBlankSpaces,
  getLegalMoves,
  replayMoves,
  type GameState,
  type Move,
} from '../../game/isolation'
import { mulberry32 } from '../../lib/rng'

function stateFrom(moves: Move[], width = 7, height = 7): GameState {
  const state = replayMoves(moves, width, height)
  if (state === null) throw new Error('Illegal test position')
  return state
}

const plentyOfTime = () => 1000

// On a 3x3 board the knight graph is a single 8-cycle around the centre.
// From here player 1 is lost: whichever arc it enters, player 2 takes the
// other and player 1 runs out of cells first.
const cycleStart = stateFrom(
  [
    [0, 0],
    [2, 2],
  ],
  3,
  3
)

describe('SearchAgent', () => {
  describe('initialization', () => {
    it('uses the default config', () => {
      const agent = new SearchAgent()
      expect(agent.name).toBe('search')
      expect(agent.getConfig()).toEqual({
        searchDepth: 3,
        evaluation: 'custom',
        iterative: true,
        method: 'minimax',
        timerThreshold: 3,
      })
      expect(agent.description).toBe('Iterative deepening minimax with custom evaluation')
    })

    it('describes fixed-depth agents', () => {
      const agent = new SearchAgent('fixed', { iterative: false, searchDepth: 4, method: 'alphabeta' })
      expect(agent.description).toBe('Depth 4 alphabeta with custom evaluation')
    })

    it('rejects a non-positive depth', () => {
      expect(() => new SearchAgent('bad', { searchDepth: 0 })).toThrow(
        'Search depth must be a positive integer, got 0'
      )
    })
  })

  describe('selectMove', () => {
    it('returns null without legal moves', async () => {
      const agent = new SearchAgent()
      const result = await agent.selectMove(createGameState(), [], plentyOfTime)
      expect(result.move).toBeNull()
    })

    it('finds the forced win by deepening', async () => {
      const state = stateFrom(
        [
          [0, 0],
          [2, 2],
          [1, 2],
        ],
        3,
        3
      )
      const agent = new SearchAgent('id', { evaluation: 'null', method: 'alphabeta' })
      const result = await agent.selectMove(state, getLegalMoves(state), plentyOfTime)

      expect(result.move).toEqual([1, 0])
      expect(result.score).toBe(Infinity)
      expect(result.searchInfo?.depth).toBe(5)
      expect(result.searchInfo?.timedOut).toBe(false)
    })

    it('stops deepening once the loss is certain', async () => {
      for (const method of ['minimax', 'alphabeta'] as const) {
        const agent = new SearchAgent('id', { evaluation: 'null', method })
        const result = await agent.selectMove(cycleStart, getLegalMoves(cycleStart), plentyOfTime)

        expect(result.move).toEqual([1, 2])
        expect(result.score).toBe(-Infinity)
        expect(result.searchInfo?.depth).toBe(6)
      }
    })

    it('deepens until every blank cell is covered', async () => {
      // Only (1, 2) and (2, 0) are blank. Player 1 at (0, 0) can reach (1, 2);
      // player 2 at (0, 1) can reach (2, 0); after both moves player 1 is stuck.
      const state: GameState = {
        width: 3,
        height: 3,
        board: [
          [1, 2, 1],
          [2, 1, null],
          [null, 2, 1],
        ],
        locations: { 1: [0, 0], 2: [0, 1] },
        activePlayer: 1,
        moveCount: 7,
        moveHistory: [],
      }

      const shallow = new SearchAgent('shallow', { iterative: false, searchDepth: 1, evaluation: 'open' })
      const shallowResult = await shallow.selectMove(state, getLegalMoves(state), plentyOfTime)
      expect(shallowResult.score).toBe(1)

      const agent = new SearchAgent('id', { evaluation: 'open', method: 'alphabeta' })
      const result = await agent.selectMove(state, getLegalMoves(state), plentyOfTime)

      expect(result.move).toEqual([1, 2])
      expect(result.score).toBe(-Infinity)
      expect(result.searchInfo?.depth).toBe(getBlankSpaces(state).length)
      expect(result.searchInfo?.depth).toBe(2)
      expect(result.searchInfo?.timedOut).toBe(false)
    })

    it('falls back to the first legal move when no search completes', async () => {
      const state = stateFrom([
        [3, 3],
        [0, 0],
      ])
      const agent = new SearchAgent('fixed', { iterative: false, searchDepth: 3 })
      const result = await agent.selectMove(state, getLegalMoves(state), () => 0)

      expect(result.move).toEqual([1, 2])
      expect(result.score).toBeUndefined()
      expect(result.searchInfo).toMatchObject({ depth: 0, nodesSearched: 0, timedOut: true })
    })

    it('keeps the deepest completed iteration when time runs out', async () => {
      const state = stateFrom([
        [3, 3],
        [0, 0],
      ])
      // Depth 1 visits 9 nodes; the clock dies part way into depth 2
      let calls = 0
      const timeLeft = () => (++calls > 12 ? 0 : 100)
      const agent = new SearchAgent('id', { evaluation: 'open', method: 'alphabeta' })
      const result = await agent.selectMove(state, getLegalMoves(state), timeLeft)

      expect(result.searchInfo?.depth).toBe(1)
      expect(result.searchInfo?.timedOut).toBe(true)
      expect(getLegalMoves(state)).toContainEqual(result.move)
    })
  })

  it('exposes its evaluation function', () => {
    const agent = new SearchAgent('open', { evaluation: 'open' })
    const state = stateFrom([
      [3, 3],
      [0, 0],
    ])
    expect(agent.evaluatePosition(state, 1)).toBe(8)
  })
})

describe('RandomAgent', () => {
  it('is reproducible from a seed', async () => {
    const state = createGameState()
    const moves = getLegalMoves(state)
    const a = new RandomAgent('a', mulberry32(42))
    const b = new RandomAgent('b', mulberry32(42))

    for (let i = 0; i < 5; i++) {
      const first = await a.selectMove(state, moves)
      const second = await b.selectMove(state, moves)
      expect(first.move).toEqual(second.move)
      expect(moves).toContainEqual(first.move)
    }
  })

  it('returns null without legal moves', async () => {
    const agent = new RandomAgent()
    expect(await agent.selectMove(createGameState(), [])).toEqual({ move: null })
  })
})

describe('GreedyAgent', () => {
  it('maximizes mobility one ply ahead', async () => {
    const state = stateFrom([
      [3, 3],
      [0, 0],
    ])
    const agent = new GreedyAgent()
    const result = await agent.selectMove(state, getLegalMoves(state))
    // (1,4) is the first move leaving five follow-up jumps
    expect(result).toEqual({ move: [1, 4], score: 5 })
  })

  it('returns null without legal moves', async () => {
    const agent = new GreedyAgent()
    expect(await agent.selectMove(createGameState(), [])).toEqual({ move: null })
  })
})

describe('presets', () => {
  it('builds search agents with the preset config', () => {
    const agent = createAgentFromPreset('AB_Improved')
    expect(agent).toBeInstanceOf(SearchAgent)
    expect(agent.name).toBe('AB_Improved')
    expect(agent.description).toBe('Depth 5 alphabeta with improved evaluation')
  })

  it('builds baseline agents', () => {
    expect(createAgentFromPreset('Random')).toBeInstanceOf(RandomAgent)
    expect(createAgentFromPreset('Greedy')).toBeInstanceOf(GreedyAgent)
  })

  it('uses custom evaluation for the student agent', () => {
    expect(AGENT_PRESETS.Student).toEqual({
      type: 'search',
      config: { method: 'alphabeta', iterative: true, evaluation: 'custom' },
    })
  })

  it('lists every preset in the rosters', () => {
    const presets = listAgentPresets()
    expect(presets).toHaveLength(13)
    for (const name of [...CPU_AGENT_NAMES, ...TEST_AGENT_NAMES]) {
      expect(presets).toContain(name)
    }
  })

  it('rejects unknown presets', () => {
    expect(isAgentPresetName('constructor')).toBe(false)
    expect(() => createAgentFromPreset('Nobody')).toThrow('Unknown agent "Nobody"')
  })
})
