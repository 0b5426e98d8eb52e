/**
 * `xsoar-packs case` command group
 *
 *   - `case get <id>`            : look up a case by id
 *   - `case create --file <json>`: create a case from a JSON document
 */

import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import { ConfigurationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_SUCCESS,
  withClient,
  writeJson,
  type ClientCommandOptions,
} from '../utils/command-context.js'
import {
  addConfigLocationOptions,
  configLocationFrom,
  type ConfigLocationFlags,
} from './shared-options.js'

const logger = createLogger('case-cmd')

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * @throws {ConfigurationError} when the file is unreadable or not a JSON object
 */
export async function readCaseFile(filePath: string): Promise<Record<string, unknown>> {
  let parsed: unknown
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf-8'))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigurationError(`Cannot read case file ${filePath}: ${message}`, { filePath })
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`Case file ${filePath} must contain a JSON object`, { filePath })
  }
  return parsed
}

export async function runCaseGet(caseId: string, opts: ClientCommandOptions = {}): Promise<number> {
  return withClient(opts, logger, async (client) => {
    writeJson(await client.getCase(caseId))
    return EXIT_SUCCESS
  })
}

export interface CaseCreateOptions extends ClientCommandOptions {
  file: string
}

export async function runCaseCreate(opts: CaseCreateOptions): Promise<number> {
  return withClient(opts, logger, async (client) => {
    const data = await readCaseFile(opts.file)
    writeJson(await client.createCase(data))
    return EXIT_SUCCESS
  })
}

export function registerCaseCommand(program: Command): void {
  const caseCmd = program.command('case').description('Look up and create cases')

  addConfigLocationOptions(
    caseCmd.command('get <id>').description('Show a case as JSON')
  ).action(async (id: string, opts: ConfigLocationFlags) => {
    const exitCode = await runCaseGet(id, configLocationFrom(opts))
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    caseCmd
      .command('create')
      .description('Create a case from a JSON file')
      .requiredOption('--file <json>', 'Path to a JSON file with the case fields')
  ).action(async (opts: ConfigLocationFlags & { file: string }) => {
    const exitCode = await runCaseCreate({ ...configLocationFrom(opts), file: opts.file })
    process.exit(exitCode)
  })
}
