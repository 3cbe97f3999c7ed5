/**
 * Plain-text tournament report: a results table with one column per test
 * agent and one row per opponent, then the Elo standings.
 */

import type { TournamentResult } from './tournament'

const LABEL_WIDTH = 16

function formatRow(label: string, cells: string[], width: number): string {
  return (label.padEnd(LABEL_WIDTH) + cells.map((c) => c.padEnd(width)).join('')).trimEnd()
}

export function formatWinRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`
}

export function formatTournamentReport(result: TournamentResult): string {
  const names = result.agents.map((a) => a.name)
  const width = Math.max(8, ...names.map((n) => n.length)) + 2
  const opponents = result.agents[0]?.matches.map((m) => m.opponent) ?? []

  const lines = [
    `Isolation tournament on a ${result.width}x${result.height} board (seed ${result.seed})`,
    `${result.numMatches} rounds of 2 games per pairing, ${result.timeLimit} ms per move`,
    '',
    formatRow('Opponent', names, width),
  ]

  opponents.forEach((opponent, i) => {
    const cells = result.agents.map((agent) => {
      const match = agent.matches[i]
      return match ? `${match.wins}-${match.losses}` : ''
    })
    lines.push(formatRow(opponent, cells, width))
  })

  lines.push(
    formatRow(
      'Win Rate',
      result.agents.map((a) => formatWinRate(a.winRate)),
      width
    )
  )

  if (result.ratings.length > 0) {
    lines.push('', 'Elo ratings')
    result.ratings.forEach((r, i) => {
      lines.push(`${String(i + 1).padStart(3)}. ${r.name.padEnd(LABEL_WIDTH)}${r.rating} (${r.gamesPlayed} games)`)
    })
  }

  return lines.join('\n')
}
