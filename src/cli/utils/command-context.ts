/**
 * Shared plumbing for CLI commands: configuration loading, client
 * construction, exit codes and error reporting.
 */

import type pino from 'pino'
import { ConfigurationError } from '../../core/errors.js'
import { createArtifactProvider } from '../../artifact-providers/provider-factory.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type {
  PartialXsoarPacksConfig,
  XsoarPacksConfig,
} from '../../modules/config/config-schema.js'
import {
  createPlatformClient,
  platformClientOptionsFromConfig,
} from '../../modules/platform-client/platform-client-impl.js'
import type { PlatformClient } from '../../modules/platform-client/platform-client.js'
import { setLogLevel } from '../../utils/logger.js'
import { maskSecrets } from './masking.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Options shared by every command
// ---------------------------------------------------------------------------

export interface ConfigLocationOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  cliOverrides?: PartialXsoarPacksConfig
}

export interface ClientCommandOptions extends ConfigLocationOptions {
  /** Pre-built client; configuration is not loaded when present */
  client?: PlatformClient
}

export async function loadConfig(opts: ConfigLocationOptions = {}): Promise<XsoarPacksConfig> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.cliOverrides !== undefined && { cliOverrides: opts.cliOverrides }),
  })
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return config
}

export async function resolveClient(opts: ClientCommandOptions = {}): Promise<PlatformClient> {
  if (opts.client !== undefined) return opts.client
  const config = await loadConfig(opts)
  return createPlatformClient(platformClientOptionsFromConfig(config), {
    artifactProvider: createArtifactProvider(config.artifacts),
  })
}

/**
 * Print `Error: <message>` to stderr and choose the exit code:
 * configuration problems exit 2, everything else 1.
 */
export function reportError(err: unknown, logger: pino.Logger): number {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`Error: ${maskSecrets(message)}\n`)
  if (err instanceof ConfigurationError) {
    logger.debug({ err }, 'Configuration error')
    return EXIT_INVALID
  }
  logger.error({ err }, 'Command failed')
  return EXIT_ERROR
}

/** Resolve a client and run `body`, turning any failure into an exit code. */
export async function withClient(
  opts: ClientCommandOptions,
  logger: pino.Logger,
  body: (client: PlatformClient) => Promise<number>
): Promise<number> {
  try {
    const client = await resolveClient(opts)
    return await body(client)
  } catch (err) {
    return reportError(err, logger)
  }
}

// ---------------------------------------------------------------------------
// Output format parsing
// ---------------------------------------------------------------------------

export type OutputFormat = 'table' | 'json'

/**
 * @throws {ConfigurationError} for anything other than `table` or `json`
 */
export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'table' || value === 'json') return value
  throw new ConfigurationError(`Unknown output format "${value}". Use "table" or "json".`)
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n')
}
