import { describe, it, expect } from 'vitest'
import { ConfigError, loadTournamentConfig } from './config'
import { CPU_AGENT_NAMES } from './ai/agents'

const clock = () => 42

describe('loadTournamentConfig', () => {
  it('falls back to defaults', () => {
    expect(loadTournamentConfig({}, {}, clock)).toEqual({
      numMatches: 5,
      timeLimit: 150,
      width: 7,
      height: 7,
      seed: 42,
      testAgents: ['ID_Improved', 'Student'],
      opponents: CPU_AGENT_NAMES,
      verbose: false,
      json: false,
    })
  })

  it('reads the environment', () => {
    const config = loadTournamentConfig(
      {},
      { ISOLATION_MATCHES: '9', ISOLATION_TIME_LIMIT: '300', ISOLATION_SEED: '7' },
      clock
    )
    expect(config.numMatches).toBe(9)
    expect(config.timeLimit).toBe(300)
    expect(config.seed).toBe(7)
  })

  it('prefers flags over the environment', () => {
    const config = loadTournamentConfig(
      { matches: 2, 'time-limit': 50, seed: 3 },
      { ISOLATION_MATCHES: '9', ISOLATION_TIME_LIMIT: '300', ISOLATION_SEED: '7' },
      clock
    )
    expect(config.numMatches).toBe(2)
    expect(config.timeLimit).toBe(50)
    expect(config.seed).toBe(3)
  })

  it('derives a 32-bit seed from the clock', () => {
    const config = loadTournamentConfig({}, {}, () => 1_700_000_000_000)
    expect(config.seed).toBe(3_487_918_080)
  })

  it('splits agent lists', () => {
    const config = loadTournamentConfig({ agents: 'Student, Greedy', opponents: 'Random' }, {}, clock)
    expect(config.testAgents).toEqual(['Student', 'Greedy'])
    expect(config.opponents).toEqual(['Random'])
  })

  it('treats empty flags as missing', () => {
    const config = loadTournamentConfig({ agents: '', width: '' }, {}, clock)
    expect(config.testAgents).toEqual(['ID_Improved', 'Student'])
    expect(config.width).toBe(7)
  })

  it('passes boolean flags through', () => {
    const config = loadTournamentConfig({ verbose: true, json: true }, {}, clock)
    expect(config.verbose).toBe(true)
    expect(config.json).toBe(true)
  })

  it('rejects unknown agents', () => {
    expect(() => loadTournamentConfig({ agents: 'Student,Nope' }, {}, clock)).toThrow(
      /testAgents\.1: Unknown agent "Nope"\. Available: Random, Greedy/
    )
  })

  it('rejects an agent that is also an opponent', () => {
    expect(() => loadTournamentConfig({ agents: 'Random', opponents: 'Random,Greedy' }, {}, clock)).toThrow(
      'Invalid configuration: Each agent may appear only once, repeated: Random'
    )
  })

  it('rejects an agent listed twice', () => {
    expect(() => loadTournamentConfig({ agents: 'Student,Student' }, {}, clock)).toThrow(
      'Invalid configuration: Each agent may appear only once, repeated: Student'
    )
  })

  it('rejects a match count below one', () => {
    expect(() => loadTournamentConfig({ matches: 0 }, {}, clock)).toThrow(
      'Invalid configuration: numMatches: Matches must be at least 1'
    )
  })

  it('rejects values that are not numbers', () => {
    expect(() => loadTournamentConfig({ width: 'wide' }, {}, clock)).toThrow(ConfigError)
  })

  it('rejects boards smaller than 3x3', () => {
    expect(() => loadTournamentConfig({ height: 2 }, {}, clock)).toThrow(/^Invalid configuration: height:/)
  })
})
