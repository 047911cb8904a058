#!/usr/bin/env -S node --import tsx
import chalk from 'chalk'
import { loadDefaultConfig } from '@iam-explorer/config'
import { createProgram } from './program.js'

try {
  await createProgram(loadDefaultConfig()).parseAsync(process.argv)
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error)
  console.error(chalk.red('Error:'), message)
  process.exit(1)
}
