export * from './game/isolation'
export {
  DEFAULT_TIME_LIMIT,
  playGame,
  type GameEndReason,
  type GameOutcome,
  type PlayGameOptions,
} from './game/match'
export * from './ai/evaluation'
export * from './ai/search'
export type { GameAgent, MoveResult, SearchInfo } from './ai/agent'
export * from './ai/agents'
export * from './tournament/elo'
export * from './tournament/tournament'
export { formatTournamentReport, formatWinRate } from './tournament/report'
export { ConfigError, loadTournamentConfig, tournamentConfigSchema, type TournamentConfig } from './config'
export { mulberry32, pickOne, type Rng } from './lib/rng'
