/**
 * Isolation Game Engine
 *
 * Rules for the knight's-move variant of Isolation. Each player places a
 * piece anywhere on the board for their first move, then moves like a chess
 * knight to a blank cell. Visited cells stay blocked for the rest of the game,
 * and the player to move with no legal move loses.
 *
 * All operations are pure: a move returns a new state and never touches the
 * one it was given.
 */

// Default board dimensions
export const DEFAULT_WIDTH = 7
export const DEFAULT_HEIGHT = 7

// Player identifiers
export type Player = 1 | 2

// A cell records which player visited it (null = still blank)
export type Cell = Player | null

// Board is represented as a 2D array: board[row][column]
export type Board = Cell[][]

// Moves are [row, column] pairs
export type Move = [number, number]

export interface GameState {
  width: number
  height: number
  board: Board
  /** Current location of each player (null until their first move) */
  locations: Record<Player, Move | null>
  activePlayer: Player
  moveCount: number
  moveHistory: Move[]
}

/**
 * Knight offsets in the order legal moves are generated.
 */
export const KNIGHT_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-2, -1],
  [-2, 1],
  [-1, -2],
  [-1, 2],
  [1, -2],
  [1, 2],
  [2, -1],
  [2, 1],
]

/**
 * Creates a new game state with an empty board.
 * Player 1 always goes first.
 */
export function createGameState(width = DEFAULT_WIDTH, height = DEFAULT_HEIGHT): GameState {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new Error(`Invalid board dimensions: ${width}x${height}`)
  }

  return {
    width,
    height,
    board: Array.from({ length: height }, () => Array<Cell>(width).fill(null)),
    locations: { 1: null, 2: null },
    activePlayer: 1,
    moveCount: 0,
    moveHistory: [],
  }
}

export function getOpponent(player: Player): Player {
  return player === 1 ? 2 : 1
}

export function isSameMove(a: Move | null, b: Move | null): boolean {
  if (a === null || b === null) return a === b
  return a[0] === b[0] && a[1] === b[1]
}

function isInBounds(state: GameState, row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < state.height &&
    col >= 0 &&
    col < state.width
  )
}

/**
 * Returns every blank cell in row-major order.
 */
export function getBlankSpaces(state: GameState): Move[] {
  const spaces: Move[] = []
  for (let row = 0; row < state.height; row++) {
    for (let col = 0; col < state.width; col++) {
      if (state.board[row][col] === null) {
        spaces.push([row, col])
      }
    }
  }
  return spaces
}

export function getPlayerLocation(state: GameState, player: Player): Move | null {
  return state.locations[player]
}

/**
 * Returns the moves available to a player.
 *
 * A player who has not been placed yet may move to any blank cell.
 * Otherwise only knight jumps onto blank, in-bounds cells are legal.
 *
 * @param state - Current game state
 * @param player - Player to generate moves for (defaults to the active player)
 */
export function getLegalMoves(state: GameState, player: Player = state.activePlayer): Move[] {
  const location = state.locations[player]
  if (location === null) {
    return getBlankSpaces(state)
  }

  const [row, col] = location
  const moves: Move[] = []
  for (const [dr, dc] of KNIGHT_DIRECTIONS) {
    const r = row + dr
    const c = col + dc
    if (isInBounds(state, r, c) && state.board[r][c] === null) {
      moves.push([r, c])
    }
  }
  return moves
}

/**
 * Checks if a move is legal for the active player.
 */
export function isLegalMove(state: GameState, move: Move): boolean {
  const [row, col] = move
  if (!isInBounds(state, row, col) || state.board[row][col] !== null) {
    return false
  }

  const location = state.locations[state.activePlayer]
  if (location === null) {
    return true
  }

  const dr = row - location[0]
  const dc = col - location[1]
  return KNIGHT_DIRECTIONS.some(([r, c]) => r === dr && c === dc)
}

/**
 * Applies a move for the active player, returning the next state.
 * Does NOT mutate the original state.
 *
 * @returns The new state, or null if the move is illegal
 */
export function applyMove(state: GameState, move: Move): GameState | null {
  if (!isLegalMove(state, move)) {
    return null
  }

  const [row, col] = move
  const player = state.activePlayer
  const board = state.board.map((cells) => [...cells])
  board[row][col] = player

  return {
    width: state.width,
    height: state.height,
    board,
    locations: { ...state.locations, [player]: [row, col] },
    activePlayer: getOpponent(player),
    moveCount: state.moveCount + 1,
    moveHistory: [...state.moveHistory, [row, col]],
  }
}

/**
 * A player loses when it is their turn and they have no legal moves.
 */
export function isLoser(state: GameState, player: Player): boolean {
  return player === state.activePlayer && getLegalMoves(state, player).length === 0
}

/**
 * A player wins when it is the opponent's turn and the opponent is stuck.
 */
export function isWinner(state: GameState, player: Player): boolean {
  return player !== state.activePlayer && getLegalMoves(state).length === 0
}

/**
 * Returns the winning player, or null while the game is still running.
 */
export function getWinner(state: GameState): Player | null {
  if (getLegalMoves(state).length > 0) return null
  return getOpponent(state.activePlayer)
}

/**
 * Terminal value of the state from the given player's perspective.
 * Non-terminal states are worth 0.
 */
export function utility(state: GameState, player: Player): number {
  if (getLegalMoves(state).length > 0) return 0
  return player === state.activePlayer ? -Infinity : Infinity
}

/**
 * Replays a game from a list of moves.
 *
 * @returns The final state, or null if any move is illegal
 */
export function replayMoves(
  moves: Move[],
  width = DEFAULT_WIDTH,
  height = DEFAULT_HEIGHT
): GameState | null {
  let state = createGameState(width, height)
  for (const move of moves) {
    const next = applyMove(state, move)
    if (next === null) {
      return null
    }
    state = next
  }
  return state
}

/**
 * Renders the board as text.
 * Current player locations show as 1/2, visited cells as '-'.
 */
export function boardToString(state: GameState): string {
  const lines: string[] = []
  for (let row = 0; row < state.height; row++) {
    let line = '|'
    for (let col = 0; col < state.width; col++) {
      let symbol = ' '
      if (isSameMove(state.locations[1], [row, col])) {
        symbol = '1'
      } else if (isSameMove(state.locations[2], [row, col])) {
        symbol = '2'
      } else if (state.board[row][col] !== null) {
        symbol = '-'
      }
      line += ` ${symbol} |`
    }
    lines.push(line)
  }
  return lines.join('\n')
}
