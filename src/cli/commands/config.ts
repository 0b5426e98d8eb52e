/**
 * `xsoar-packs config` command group
 *
 * Subcommands:
 *   - `xsoar-packs config show`: display merged config (credentials masked)
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigurationError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_SUCCESS,
  reportError,
  writeJson,
  type ConfigLocationOptions,
} from '../utils/command-context.js'
import {
  addConfigLocationOptions,
  configLocationFrom,
  type ConfigLocationFlags,
} from './shared-options.js'

const logger = createLogger('config-cmd')

export type ConfigShowFormat = 'yaml' | 'json'

export interface ConfigShowOptions extends ConfigLocationOptions {
  format?: string
}

function parseShowFormat(value: string): ConfigShowFormat {
  if (value === 'yaml' || value === 'json') return value
  throw new ConfigurationError(`Unknown format "${value}". Use "yaml" or "json".`)
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  try {
    const format = parseShowFormat(opts.format ?? 'yaml')
    const system = createConfigSystem({
      ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
      ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      ...(opts.cliOverrides !== undefined && { cliOverrides: opts.cliOverrides }),
    })
    await system.load()
    const masked = system.getMasked()

    if (format === 'json') {
      writeJson(masked)
    } else {
      process.stdout.write('# xsoar-packs configuration (credentials masked)\n\n')
      process.stdout.write(yaml.dump(masked))
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger)
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View xsoar-packs configuration')

  addConfigLocationOptions(
    configCmd
      .command('show')
      .description('Display the merged configuration with credentials masked')
      .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
  ).action(async (opts: ConfigLocationFlags & { format: string }) => {
    const exitCode = await runConfigShow({ ...configLocationFrom(opts), format: opts.format })
    process.exit(exitCode)
  })
}
