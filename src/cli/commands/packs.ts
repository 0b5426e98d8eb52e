/**
 * `xsoar-packs packs` command group
 *
 * Subcommands:
 *   - `packs installed [--expired]`       : list installed packs
 *   - `packs outdated`                    : report packs with a newer version
 *   - `packs available <id> <version>`    : check whether an artifact exists
 *   - `packs latest <id>`                 : latest custom pack version in the artifact store
 *   - `packs deploy <id> <version>`       : download and install one pack
 *   - `packs update [--dry-run]`          : deploy every outdated pack
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../artifact-providers/provider-utils.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  parseOutputFormat,
  withClient,
  writeJson,
  type ClientCommandOptions,
} from '../utils/command-context.js'
import { formatInstalledPacksTable, formatOutdatedPacksTable } from '../utils/formatting.js'
import { maskSecrets } from '../utils/masking.js'
import {
  addConfigLocationOptions,
  configLocationFrom,
  type ConfigLocationFlags,
} from './shared-options.js'

const logger = createLogger('packs-cmd')

// ---------------------------------------------------------------------------
// packs installed
// ---------------------------------------------------------------------------

export interface PacksInstalledOptions extends ClientCommandOptions {
  expired?: boolean
  output?: string
}

export async function runPacksInstalled(opts: PacksInstalledOptions = {}): Promise<number> {
  return withClient(opts, logger, async (client) => {
    const format = parseOutputFormat(opts.output ?? 'table')
    const packs =
      opts.expired === true
        ? await client.getInstalledExpiredPacks()
        : await client.getInstalledPacks()

    if (format === 'json') {
      writeJson(packs)
    } else if (packs.length === 0) {
      process.stdout.write('No packs installed.\n')
    } else {
      process.stdout.write(formatInstalledPacksTable(packs) + '\n')
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// packs outdated
// ---------------------------------------------------------------------------

export interface PacksOutdatedOptions extends ClientCommandOptions {
  output?: string
}

export async function runPacksOutdated(opts: PacksOutdatedOptions = {}): Promise<number> {
  return withClient(opts, logger, async (client) => {
    const format = parseOutputFormat(opts.output ?? 'table')
    const outdated = await client.getOutdatedPacks()

    if (format === 'json') {
      writeJson(outdated)
    } else if (outdated.length === 0) {
      process.stdout.write('All packs are up to date.\n')
    } else {
      process.stdout.write(formatOutdatedPacksTable(outdated) + '\n')
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// packs available / latest / deploy
// ---------------------------------------------------------------------------

export interface PackSourceOptions extends ClientCommandOptions {
  custom?: boolean
}

/** Exits 0 when the artifact exists, 1 when it does not. */
export async function runPacksAvailable(
  packId: string,
  packVersion: string,
  opts: PackSourceOptions = {}
): Promise<number> {
  return withClient(opts, logger, async (client) => {
    const available = await client.isPackAvailable(packId, packVersion, opts.custom === true)
    process.stdout.write(`${packId} ${packVersion}: ${available ? 'available' : 'not available'}\n`)
    return available ? EXIT_SUCCESS : EXIT_ERROR
  })
}

export async function runPacksLatest(
  packId: string,
  opts: ClientCommandOptions = {}
): Promise<number> {
  return withClient(opts, logger, async (client) => {
    const latest = await client.getLatestCustomPackVersion(packId)
    process.stdout.write(`${latest}\n`)
    return EXIT_SUCCESS
  })
}

export async function runPacksDeploy(
  packId: string,
  packVersion: string,
  opts: PackSourceOptions = {}
): Promise<number> {
  return withClient(opts, logger, async (client) => {
    await client.deployPack(packId, packVersion, opts.custom === true)
    process.stdout.write(`Deployed ${packId} ${packVersion}\n`)
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// packs update
// ---------------------------------------------------------------------------

export interface PacksUpdateOptions extends ClientCommandOptions {
  dryRun?: boolean
}

/**
 * Deploy every outdated pack in report order. A failed pack does not stop
 * the run; the exit code is 1 when any pack failed.
 */
export async function runPacksUpdate(opts: PacksUpdateOptions = {}): Promise<number> {
  return withClient(opts, logger, async (client) => {
    const outdated = await client.getOutdatedPacks()
    if (outdated.length === 0) {
      process.stdout.write('All packs are up to date.\n')
      return EXIT_SUCCESS
    }

    if (opts.dryRun === true) {
      process.stdout.write(formatOutdatedPacksTable(outdated) + '\n')
      process.stdout.write(`\n${String(outdated.length)} pack(s) would be updated.\n`)
      return EXIT_SUCCESS
    }

    const failures: string[] = []
    for (const entry of outdated) {
      try {
        await client.deployPack(entry.id, entry.latest, entry.custom)
        process.stdout.write(`Updated ${entry.id} ${entry.currentVersion} -> ${entry.latest}\n`)
      } catch (err) {
        logger.warn({ packId: entry.id, err }, 'Pack update failed')
        failures.push(entry.id)
        process.stderr.write(`Failed to update ${entry.id}: ${maskSecrets(errorMessage(err))}\n`)
      }
    }

    const updated = outdated.length - failures.length
    process.stdout.write(
      `\n${String(updated)} of ${String(outdated.length)} pack(s) updated.\n`
    )
    if (failures.length > 0) {
      process.stderr.write(`Failed: ${failures.join(', ')}\n`)
      return EXIT_ERROR
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

interface OutputFlags extends ConfigLocationFlags {
  output: string
}

export function registerPacksCommand(program: Command): void {
  const packsCmd = program.command('packs').description('Inspect, check and deploy content packs')

  addConfigLocationOptions(
    packsCmd
      .command('installed')
      .description('List installed packs')
      .option('--expired', 'List installed packs with expiry and update information')
      .option('--output <format>', 'Output format: table (default) or json', 'table')
  ).action(async (opts: OutputFlags & { expired?: boolean }) => {
    const exitCode = await runPacksInstalled({
      ...configLocationFrom(opts),
      output: opts.output,
      expired: opts.expired === true,
    })
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    packsCmd
      .command('outdated')
      .description('Report installed packs that have a newer version')
      .option('--output <format>', 'Output format: table (default) or json', 'table')
  ).action(async (opts: OutputFlags) => {
    const exitCode = await runPacksOutdated({ ...configLocationFrom(opts), output: opts.output })
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    packsCmd
      .command('available <id> <version>')
      .description('Check whether a pack version can be downloaded')
      .option('--custom', 'Look in the artifact store instead of the marketplace')
  ).action(async (id: string, version: string, opts: ConfigLocationFlags & { custom?: boolean }) => {
    const exitCode = await runPacksAvailable(id, version, {
      ...configLocationFrom(opts),
      custom: opts.custom === true,
    })
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    packsCmd
      .command('latest <id>')
      .description('Show the latest version of a custom pack in the artifact store')
  ).action(async (id: string, opts: ConfigLocationFlags) => {
    const exitCode = await runPacksLatest(id, configLocationFrom(opts))
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    packsCmd
      .command('deploy <id> <version>')
      .description('Download a pack and install it on the server')
      .option('--custom', 'Take the pack from the artifact store instead of the marketplace')
  ).action(async (id: string, version: string, opts: ConfigLocationFlags & { custom?: boolean }) => {
    const exitCode = await runPacksDeploy(id, version, {
      ...configLocationFrom(opts),
      custom: opts.custom === true,
    })
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    packsCmd
      .command('update')
      .description('Deploy the latest version of every outdated pack')
      .option('--dry-run', 'Only list the packs that would be updated')
  ).action(async (opts: ConfigLocationFlags & { dryRun?: boolean }) => {
    const exitCode = await runPacksUpdate({
      ...configLocationFrom(opts),
      dryRun: opts.dryRun === true,
    })
    process.exit(exitCode)
  })
}
