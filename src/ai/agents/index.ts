/**
 * Agent Presets
 *
 * The tournament roster. CPU agents are the fixed reference opponents;
 * test agents are the iterative-deepening agents being measured.
 */

import type { GameAgent } from '../agent'
import type { EvaluationName } from '../evaluation'
import type { Rng } from '../../lib/rng'
import { GreedyAgent, RandomAgent } from './baseline-agents'
import { SearchAgent, type SearchAgentConfig } from './search-agent'

export type AgentPreset =
  | { type: 'random' }
  | { type: 'greedy'; evaluation: EvaluationName }
  | { type: 'search'; config: Partial<SearchAgentConfig> }

const MINIMAX_DEPTH = 3
const ALPHABETA_DEPTH = 5

function fixedMinimax(evaluation: EvaluationName): AgentPreset {
  return {
    type: 'search',
    config: { method: 'minimax', iterative: false, searchDepth: MINIMAX_DEPTH, evaluation },
  }
}

function fixedAlphabeta(evaluation: EvaluationName): AgentPreset {
  return {
    type: 'search',
    config: { method: 'alphabeta', iterative: false, searchDepth: ALPHABETA_DEPTH, evaluation },
  }
}

function iterativeAlphabeta(evaluation: EvaluationName): AgentPreset {
  return { type: 'search', config: { method: 'alphabeta', iterative: true, evaluation } }
}

export const AGENT_PRESETS = {
  Random: { type: 'random' },
  Greedy: { type: 'greedy', evaluation: 'open' },
  MM_Null: fixedMinimax('null'),
  MM_Open: fixedMinimax('open'),
  MM_Improved: fixedMinimax('improved'),
  AB_Null: fixedAlphabeta('null'),
  AB_Open: fixedAlphabeta('open'),
  AB_Improved: fixedAlphabeta('improved'),
  ID_Improved: iterativeAlphabeta('improved'),
  ID_Ratio: iterativeAlphabeta('ratio-of-moves'),
  ID_Spaces: iterativeAlphabeta('move-diff-with-spaces'),
  ID_Center: iterativeAlphabeta('move-diff-from-center'),
  Student: iterativeAlphabeta('custom'),
} satisfies Record<string, AgentPreset>

export type AgentPresetName = keyof typeof AGENT_PRESETS

export const CPU_AGENT_NAMES: AgentPresetName[] = [
  'Random',
  'MM_Null',
  'MM_Open',
  'MM_Improved',
  'AB_Null',
  'AB_Open',
  'AB_Improved',
]

export const TEST_AGENT_NAMES: AgentPresetName[] = ['ID_Improved', 'Student']

export function isAgentPresetName(name: string): name is AgentPresetName {
  return Object.hasOwn(AGENT_PRESETS, name)
}

export function listAgentPresets(): AgentPresetName[] {
  return Object.keys(AGENT_PRESETS).filter(isAgentPresetName)
}

/**
 * Creates an agent from a preset.
 *
 * @param rng - Random source for agents that need one
 * @throws Error if the preset is not registered
 */
export function createAgentFromPreset(name: string, rng: Rng = Math.random): GameAgent {
  if (!isAgentPresetName(name)) {
    throw new Error(`Unknown agent "${name}". Available: ${listAgentPresets().join(', ')}`)
  }

  const preset: AgentPreset = AGENT_PRESETS[name]
  switch (preset.type) {
    case 'random':
      return new RandomAgent(name, rng)
    case 'greedy':
      return new GreedyAgent(name, preset.evaluation)
    case 'search':
      return new SearchAgent(name, preset.config)
  }
}

export { GreedyAgent, RandomAgent, SearchAgent }
export { DEFAULT_SEARCH_AGENT_CONFIG, type SearchAgentConfig } from './search-agent'
