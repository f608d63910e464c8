import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:   chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  green:  chalk.hex('#81C784'),
  red:    chalk.hex('#CF6679'),
} as const

const _resultColors: Record<string, ChalkInstance> = {
  success: t.green,
  failure: t.red,
}

export const resultColor = (result: string): ChalkInstance =>
  _resultColors[result] ?? t.text
