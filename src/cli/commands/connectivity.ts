/**
 * `xsoar-packs connectivity` command
 *
 * Checks the platform health endpoint and, when one is configured, the
 * artifact store.
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_SUCCESS,
  withClient,
  type ClientCommandOptions,
} from '../utils/command-context.js'
import { addConfigLocationOptions, configLocationFrom, type ConfigLocationFlags } from './shared-options.js'

const logger = createLogger('connectivity-cmd')

export async function runConnectivityCommand(opts: ClientCommandOptions = {}): Promise<number> {
  return withClient(opts, logger, async (client) => {
    await client.testConnectivity()
    process.stdout.write(`XSOAR server: OK (${client.serverUrl})\n`)

    const provider = client.artifactProvider
    if (provider === undefined) {
      process.stdout.write('Artifact store: not configured\n')
      return EXIT_SUCCESS
    }
    await provider.testConnection()
    process.stdout.write(`Artifact store: OK (${provider.location})\n`)
    return EXIT_SUCCESS
  })
}

export function registerConnectivityCommand(program: Command): void {
  addConfigLocationOptions(
    program
      .command('connectivity')
      .description('Check connectivity to the XSOAR server and the artifact store')
  ).action(async (opts: ConfigLocationFlags) => {
    const exitCode = await runConnectivityCommand(configLocationFrom(opts))
    process.exit(exitCode)
  })
}
