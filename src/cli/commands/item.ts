/**
 * `xsoar-packs item` command group
 *
 * Download, attach or detach a single content item (playbooks only).
 */

import type { Command } from 'commander'
import { writeFile } from 'fs/promises'
import { createLogger } from '../../utils/logger.js'
import { EXIT_SUCCESS, withClient, type ClientCommandOptions } from '../utils/command-context.js'
import {
  addConfigLocationOptions,
  configLocationFrom,
  type ConfigLocationFlags,
} from './shared-options.js'

const logger = createLogger('item-cmd')

export interface ItemDownloadOptions extends ClientCommandOptions {
  /** Write to this file instead of stdout */
  out?: string
}

export async function runItemDownload(
  itemType: string,
  itemId: string,
  opts: ItemDownloadOptions = {}
): Promise<number> {
  return withClient(opts, logger, async (client) => {
    const content = await client.downloadItem(itemType, itemId)
    if (opts.out !== undefined) {
      await writeFile(opts.out, content)
      process.stdout.write(`Wrote ${itemType} ${itemId} to ${opts.out}\n`)
    } else {
      process.stdout.write(content)
    }
    return EXIT_SUCCESS
  })
}

export async function runItemAttach(
  itemType: string,
  itemId: string,
  opts: ClientCommandOptions = {}
): Promise<number> {
  return withClient(opts, logger, async (client) => {
    await client.attachItem(itemType, itemId)
    process.stdout.write(`Attached ${itemType} ${itemId}\n`)
    return EXIT_SUCCESS
  })
}

export async function runItemDetach(
  itemType: string,
  itemId: string,
  opts: ClientCommandOptions = {}
): Promise<number> {
  return withClient(opts, logger, async (client) => {
    await client.detachItem(itemType, itemId)
    process.stdout.write(`Detached ${itemType} ${itemId}\n`)
    return EXIT_SUCCESS
  })
}

export function registerItemCommand(program: Command): void {
  const itemCmd = program.command('item').description('Manage individual content items')

  addConfigLocationOptions(
    itemCmd
      .command('download <type> <id>')
      .description('Download a content item (e.g. a playbook as YAML)')
      .option('--out <file>', 'Write the item to a file instead of stdout')
  ).action(async (type: string, id: string, opts: ConfigLocationFlags & { out?: string }) => {
    const exitCode = await runItemDownload(type, id, {
      ...configLocationFrom(opts),
      ...(opts.out !== undefined && { out: opts.out }),
    })
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    itemCmd.command('attach <type> <id>').description('Re-attach a detached content item')
  ).action(async (type: string, id: string, opts: ConfigLocationFlags) => {
    const exitCode = await runItemAttach(type, id, configLocationFrom(opts))
    process.exit(exitCode)
  })

  addConfigLocationOptions(
    itemCmd
      .command('detach <type> <id>')
      .description('Detach a content item so that it can be edited locally')
  ).action(async (type: string, id: string, opts: ConfigLocationFlags) => {
    const exitCode = await runItemDetach(type, id, configLocationFrom(opts))
    process.exit(exitCode)
  })
}
