/**
 * Option flags every command accepts for locating configuration.
 */

import type { Command } from 'commander'
import type { ConfigLocationOptions } from '../utils/command-context.js'

export interface ConfigLocationFlags {
  projectConfigDir?: string
  globalConfigDir?: string
}

export function addConfigLocationOptions(command: Command): Command {
  return command
    .option('--project-config-dir <dir>', 'Path to project .xsoar-packs/ directory')
    .option('--global-config-dir <dir>', 'Path to global .xsoar-packs/ directory')
}

export function configLocationFrom(flags: ConfigLocationFlags): ConfigLocationOptions {
  return {
    ...(flags.projectConfigDir !== undefined && { projectConfigDir: flags.projectConfigDir }),
    ...(flags.globalConfigDir !== undefined && { globalConfigDir: flags.globalConfigDir }),
  }
}
