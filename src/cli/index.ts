#!/usr/bin/env node
/**
 * xsoar-packs CLI - Main entry point
 * Provides the `xsoar-packs` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { realpathSync } from 'fs'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerConnectivityCommand } from './commands/connectivity.js'
import { registerPacksCommand } from './commands/packs.js'
import { registerItemCommand } from './commands/item.js'
import { registerCaseCommand } from './commands/case.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

const PackageManifestSchema = z.object({ name: z.string(), version: z.string() }).passthrough()

/** Resolve the package version from package.json beside src/ or dist/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of candidates) {
    let raw: string
    try {
      raw = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const parsed = PackageManifestSchema.safeParse(JSON.parse(raw))
    if (parsed.success && parsed.data.name === 'xsoar-packs') {
      return parsed.data.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('xsoar-packs')
    .description('Reconcile and deploy XSOAR content packs from the marketplace or a private artifact store')
    .version(version, '-v, --version', 'Output the current version')

  registerConnectivityCommand(program)
  registerPacksCommand(program)
  registerItemCommand(program)
  registerCaseCommand(program)
  registerConfigCommand(program)

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

// Only run when executed directly, not when imported by tests
const entry = process.argv[1]
if (entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  void main()
}
