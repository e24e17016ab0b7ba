#!/usr/bin/env node
/**
 * mutant-gate CLI - Main entry point
 * Provides the `mutant-gate` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerRecordCommand } from './commands/record.js'
import { registerGateCommand } from './commands/gate.js'
import { registerDiffCommand } from './commands/diff.js'
import { registerHistoryCommand } from './commands/history.js'

const logger = createLogger('cli')

function readVersion(content: string): string | undefined {
  const pkg: unknown = JSON.parse(content)
  if (typeof pkg !== 'object' || pkg === null) return undefined
  const version: unknown = Reflect.get(pkg, 'version')
  return typeof version === 'string' ? version : undefined
}

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const __filename = fileURLToPath(import.meta.url)
  const __dirname = dirname(__filename)
  // src/cli/ when run from sources, dist/cli/ when built
  const paths = [
    resolve(__dirname, '../../package.json'),
    resolve(__dirname, '../package.json'),
  ]

  for (const pkgPath of paths) {
    try {
      const version = readVersion(await readFile(pkgPath, 'utf-8'))
      if (version !== undefined) return version
    } catch (err) {
      logger.debug({ err, pkgPath }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('mutant-gate')
    .description('mutant-gate - Mutation-testing quality gate and build-to-build report diff')
    .version(version, '-v, --version', 'Output the current version')

  registerRecordCommand(program, version)
  registerGateCommand(program, version)
  registerDiffCommand(program, version)
  registerHistoryCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
