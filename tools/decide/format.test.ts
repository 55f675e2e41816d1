import { WATERING_SYSTEM, explainDuration, loadWateringSystem } from '../../src'

import {
  formatCondition,
  formatDegrees,
  formatDuration,
  formatExplanation,
  formatMove,
  formatRule,
  formatRuleTable,
  formatShape,
} from './format'

const system = loadWateringSystem(WATERING_SYSTEM)

describe('formatMove', () => {
  it('lists the spoken numbers and the new total', () => {
    expect(formatMove(17, 3)).toEqual(['Computer says: 18, 19, 20', 'Running total: 20'])
  })
})

describe('formatCondition', () => {
  it('renders plain and negated conditions', () => {
    expect(formatCondition({ variable: 'soil_moisture', category: 'wet' })).toBe('soil_moisture IS wet')
    expect(formatCondition({ variable: 'soil_moisture', category: 'dry', negated: true }))
      .toBe('soil_moisture IS NOT dry')
  })
})

describe('formatRule', () => {
  it('joins conditions with AND', () => {
    expect(formatRule(WATERING_SYSTEM.rules[8], 'watering_time'))
      .toBe('R9: IF air_humidity IS high AND soil_moisture IS NOT dry THEN watering_time IS none')
  })
})

describe('formatShape', () => {
  it('lists the breakpoints', () => {
    expect(formatShape({ kind: 'triangular', points: [30, 50, 70] })).toBe('triangular(30, 50, 70)')
  })
})

describe('formatDegrees', () => {
  it('renders two decimals per category', () => {
    expect(formatDegrees({ dry: 0.75, moist: 0, wet: 0 })).toBe('dry 0.75, moist 0.00, wet 0.00')
  })
})

describe('formatRuleTable', () => {
  const lines = formatRuleTable(WATERING_SYSTEM)

  it('starts with the version', () => {
    expect(lines[0]).toBe('Watering rule base 1.0.0')
  })

  it('lists variables with their categories', () => {
    expect(lines).toContain('temperature [0, 45] (C)')
    expect(lines).toContain('  hot: trapezoidal(27, 35, 45, 45)')
    expect(lines).toContain('watering_time [0, 60] (min)')
  })

  it('ends with the nine rules', () => {
    expect(lines.slice(-9)[0]).toBe('R1: IF soil_moisture IS wet THEN watering_time IS none')
    expect(lines[lines.length - 1]).toBe(
      'R9: IF air_humidity IS high AND soil_moisture IS NOT dry THEN watering_time IS none'
    )
  })
})

describe('formatDuration', () => {
  it('renders minutes with one decimal', () => {
    const decision = explainDuration(system, { soilMoisture: 25, temperature: 35, airHumidity: 30 })

    expect(formatDuration(decision)).toBe('Watering time: 49.3 min')
  })

  it('marks a fallback', () => {
    const decision = { ...explainDuration(system, { soilMoisture: 50, temperature: 23, airHumidity: 50 }), duration: 0, fallback: true }

    expect(formatDuration(decision)).toBe('Watering time: 0.0 min (no rule fired)')
  })
})

describe('formatExplanation', () => {
  it('shows clamped inputs, degrees and rule strengths', () => {
    const decision = explainDuration(system, { soilMoisture: 25, temperature: 35, airHumidity: 30 })
    const lines = formatExplanation(decision, system.config)

    expect(lines[0]).toBe('Inputs:')
    expect(lines[1]).toBe('  soil_moisture 25.0%: dry 0.75, moist 0.00, wet 0.00')
    expect(lines[2]).toBe('  temperature 35.0C: cold 0.00, warm 0.00, hot 1.00')
    expect(lines[3]).toBe('  air_humidity 30.0%: low 0.75, medium 0.00, high 0.00')
    expect(lines[4]).toBe('Rules:')
    expect(lines[6]).toBe('  R2 0.75 -> long  Dry soil on a hot day needs a long watering')
    expect(lines).toHaveLength(14)
  })
})
