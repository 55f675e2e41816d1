/**
 * Plain-text rendering of decisions and rule tables
 */

import { fmtMinutes, fmtReading, formatSpoken } from '../../src'
import type {
  FuzzyRule,
  FuzzySystem,
  MembershipDegrees,
  MembershipShape,
  RuleCondition,
  WateringDecision,
} from '../../src'

export function formatMove(total: number, count: number): string[] {
  return [
    `Computer says: ${formatSpoken(total, count)}`,
    `Running total: ${total + count}`,
  ]
}

export function formatCondition(condition: RuleCondition): string {
  return `${condition.variable} IS ${condition.negated ? 'NOT ' : ''}${condition.category}`
}

export function formatRule(rule: FuzzyRule, outputName: string): string {
  const conditions = rule.when.map(formatCondition).join(' AND ')
  return `${rule.id}: IF ${conditions} THEN ${outputName} IS ${rule.then}`
}

export function formatShape(shape: MembershipShape): string {
  return `${shape.kind}(${shape.points.join(', ')})`
}

export function formatDegrees(degrees: MembershipDegrees): string {
  return Object.keys(degrees)
    .map((name) => `${name} ${degrees[name].toFixed(2)}`)
    .join(', ')
}

export function formatRuleTable(system: FuzzySystem): string[] {
  const lines: string[] = [`Watering rule base ${system.version}`, '']

  for (const variable of [...system.inputs, system.output]) {
    lines.push(`${variable.name} [${variable.universe.min}, ${variable.universe.max}]${variable.unit.trim() ? ` (${variable.unit.trim()})` : ''}`)
    for (const name of Object.keys(variable.categories)) {
      lines.push(`  ${name}: ${formatShape(variable.categories[name])}`)
    }
  }

  lines.push('')
  for (const rule of system.rules) {
    lines.push(formatRule(rule, system.output.name))
  }
  return lines
}

export function formatDuration(decision: WateringDecision): string {
  return `Watering time: ${fmtMinutes(decision.duration)}${decision.fallback ? ' (no rule fired)' : ''}`
}

/**
 * Inputs, degrees and rule strengths behind a decision
 */
export function formatExplanation(decision: WateringDecision, system: FuzzySystem): string[] {
  const lines: string[] = ['Inputs:']
  for (const variable of system.inputs) {
    const value = decision.inputs[variable.name]
    lines.push(`  ${variable.name} ${fmtReading(value, variable.unit)}: ${formatDegrees(decision.degrees[variable.name])}`)
  }

  lines.push('Rules:')
  for (const rule of decision.rules) {
    lines.push(`  ${rule.id} ${rule.strength.toFixed(2)} -> ${rule.consequent}  ${rule.description}`)
  }
  return lines
}
