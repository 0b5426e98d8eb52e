/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { XsoarPacksConfig, PartialXsoarPacksConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level config directory (default: <cwd>/.xsoar-packs) */
  projectConfigDir?: string
  /** Path to the user-level config directory (default: ~/.xsoar-packs) */
  globalConfigDir?: string
  /**
   * Values that override everything else.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialXsoarPacksConfig
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigurationError} if `load()` has not been called
   */
  getConfig(): XsoarPacksConfig

  /**
   * Return a single value by dot-notation key (e.g. "server.version").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Return the merged config with all credential values masked.
   * Safe to display in CLI output or logs.
   */
  getMasked(): XsoarPacksConfig

  readonly isLoaded: boolean
}
