#!/usr/bin/env node
/**
 * decide
 * Command line front end for the move selector and watering estimator
 */

import chalk from 'chalk'
import { program } from 'commander'

import {
  GAME_RULES,
  LOG_LEVELS,
  WATERING_SYSTEM,
  createConsoleSink,
  createLogger,
  explainDuration,
  loadWateringSystem,
  selectMove,
} from '../../src'
import type { Logger } from '../../src'

import { parseReadingArg, parseTotalArg } from './args'
import { getConfig } from './config'
import { formatDuration, formatExplanation, formatMove, formatRuleTable } from './format'

interface EstimateOptions {
  moisture: number
  temperature: number
  humidity: number
  explain?: boolean
}

const config = getConfig()
if (!config.colors) {
  chalk.level = 0
}

function createCliLogger(): Logger {
  const sink = createConsoleSink(console, { colors: config.colors }, LOG_LEVELS)
  return createLogger(
    { level: config.logLevel },
    { sinks: [{ sink, minLevel: LOG_LEVELS.DEBUG }] },
    LOG_LEVELS,
  )
}

const logger = createCliLogger()

function runMove(total: number): void {
  const count = selectMove(total, GAME_RULES, Math.random)
  logger.debug(`Move from ${total}: ${count}`)

  const [spoken, running] = formatMove(total, count)
  console.log(chalk.cyan.bold(spoken))
  console.log(chalk.gray(running))
  if (total + count === GAME_RULES.target) {
    console.log(chalk.red(`Computer said ${GAME_RULES.target} and loses`))
  }
}

function runEstimate(options: EstimateOptions): void {
  const system = loadWateringSystem(WATERING_SYSTEM, { logger })
  const decision = explainDuration(system, {
    soilMoisture: options.moisture,
    temperature: options.temperature,
    airHumidity: options.humidity,
  })

  const line = formatDuration(decision)
  console.log(decision.fallback ? chalk.yellow(line) : chalk.green.bold(line))

  if (options.explain) {
    console.log(chalk.gray('─'.repeat(40)))
    formatExplanation(decision, system.config).forEach((l) => console.log(l))
  }
}

function runRules(): void {
  loadWateringSystem(WATERING_SYSTEM, { logger })
  const [title, ...rest] = formatRuleTable(WATERING_SYSTEM)
  console.log(chalk.cyan.bold(title))
  rest.forEach((l) => console.log(l))
}

program
  .name('decide')
  .description('Pick a "Don\'t Say 21" move or estimate a watering time')

program
  .command('move')
  .description('Choose how many numbers the computer speaks')
  .argument('<total>', 'last number spoken (0 before the first move)', parseTotalArg)
  .action((total: number) => runMove(total))

program
  .command('estimate')
  .description('Estimate the watering time in minutes')
  .requiredOption('-m, --moisture <percent>', 'soil moisture (0-100 %)', parseReadingArg)
  .requiredOption('-t, --temperature <celsius>', 'air temperature (0-45 C)', parseReadingArg)
  .requiredOption('-a, --humidity <percent>', 'air humidity (0-100 %)', parseReadingArg)
  .option('-e, --explain', 'show membership degrees and rule strengths')
  .action((options: EstimateOptions) => runEstimate(options))

program
  .command('rules')
  .description('Print the watering rule base')
  .action(() => runRules())

try {
  program.parse(process.argv)
} catch (error) {
  console.error(chalk.red('✗ Error:'), error instanceof Error ? error.message : String(error))
  process.exit(1)
}
