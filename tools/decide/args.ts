/**
 * Argument parsers for commander
 */

import { InvalidArgumentError } from 'commander'

export function parseTotalArg(value: string): number {
  const text = value.trim()
  if (!/^\d+$/.test(text)) {
    throw new InvalidArgumentError('Expected a whole number.')
  }
  return parseInt(text, 10)
}

export function parseReadingArg(value: string): number {
  const text = value.trim()
  const reading = Number(text)
  if (text === '' || !Number.isFinite(reading)) {
    throw new InvalidArgumentError('Expected a number.')
  }
  return reading
}
