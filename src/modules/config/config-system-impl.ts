/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.xsoar-packs/config.yaml)
 *     → project config      (./.xsoar-packs/config.yaml)
 *     → environment vars    (DEMISTO_*, XSIAM_AUTH_ID, XSOAR_*)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { ConfigurationError } from '../../core/errors.js'
import {
  XsoarPacksConfigSchema,
  PartialXsoarPacksConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  type XsoarPacksConfig,
  type PartialXsoarPacksConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

export const CONFIG_DIR_NAME = '.xsoar-packs'
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Merge `override` into a copy of `base`; arrays and scalars replace. */
function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

type EnvCoercer = (raw: string) => unknown

function coerceScalar(raw: string): unknown {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  return raw
}

const asString: EnvCoercer = (raw) => raw

const asList: EnvCoercer = (raw) =>
  raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

/**
 * Environment variable names and the config path each one sets.
 * The DEMISTO_* and XSIAM_AUTH_ID names are the platform SDK's own.
 */
const ENV_VAR_MAP: Record<string, { path: string; coerce: EnvCoercer }> = {
  DEMISTO_BASE_URL: { path: 'server.url', coerce: asString },
  DEMISTO_API_KEY: { path: 'server.api_token', coerce: asString },
  XSIAM_AUTH_ID: { path: 'server.auth_id', coerce: asString },
  XSOAR_SERVER_VERSION: { path: 'server.version', coerce: coerceScalar },
  XSOAR_VERIFY_SSL: { path: 'server.verify_ssl', coerce: coerceScalar },
  XSOAR_CUSTOM_PACK_AUTHORS: { path: 'custom_pack_authors', coerce: asList },
  XSOAR_ARTIFACTS_BACKEND: { path: 'artifacts.backend', coerce: asString },
  XSOAR_S3_BUCKET: { path: 'artifacts.s3.bucket_name', coerce: asString },
  XSOAR_S3_REGION: { path: 'artifacts.s3.region', coerce: asString },
  XSOAR_AZURE_STORAGE_URL: { path: 'artifacts.azure.storage_account_url', coerce: asString },
  XSOAR_AZURE_CONTAINER: { path: 'artifacts.azure.container_name', coerce: asString },
  XSOAR_LOG_LEVEL: { path: 'global.log_level', coerce: asString },
}

function setPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.')
  const lastKey = parts.pop() ?? ''
  let cursor = target
  for (const part of parts) {
    const next = cursor[part]
    if (isPlainObject(next)) {
      cursor = next
    } else {
      const created: Record<string, unknown> = {}
      cursor[part] = created
      cursor = created
    }
  }
  cursor[lastKey] = value
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Empty variables are ignored; each variable is validated on its own, so an
 * invalid one is dropped with a warning naming it and the rest still apply.
 */
function readEnvOverrides(): PartialXsoarPacksConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, { path, coerce }] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = process.env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    const value = coerce(rawValue)
    const single: Record<string, unknown> = {}
    setPath(single, path, value)
    const check = PartialXsoarPacksConfigSchema.safeParse(single)
    if (!check.success) {
      logger.warn(
        { envKey, errors: check.error.issues },
        `Ignoring invalid environment variable ${envKey}`
      )
      continue
    }
    setPath(overrides, path, value)
  }

  const parsed = PartialXsoarPacksConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: XsoarPacksConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialXsoarPacksConfig

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), CONFIG_DIR_NAME)
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), CONFIG_DIR_NAME)
    this._cliOverrides = options.cliOverrides ?? {}
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const layers: PartialXsoarPacksConfig[] = []

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE_NAME))
    if (globalConfig !== null) layers.push(globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, CONFIG_FILE_NAME))
    if (projectConfig !== null) layers.push(projectConfig)

    layers.push(readEnvOverrides(), this._cliOverrides)

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = XsoarPacksConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigurationError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug({ serverVersion: result.data.server.version, backend: result.data.artifacts.backend }, 'Configuration loaded')
  }

  getConfig(): XsoarPacksConfig {
    if (this._config === null) {
      throw new ConfigurationError(
        'Configuration has not been loaded. Call load() before getConfig().'
      )
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): XsoarPacksConfig {
    return XsoarPacksConfigSchema.parse(deepMask(this.getConfig()))
  }

  getConfigFormatVersion(): string {
    return CURRENT_CONFIG_FORMAT_VERSION
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialXsoarPacksConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigurationError(`Failed to read config file at ${filePath}: ${message}`, {
        filePath,
      })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialXsoarPacksConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
