/**
 * Built-in default values for the xsoar-packs configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { XsoarPacksConfig } from './config-schema.js'

export const DEFAULT_CONFIG: XsoarPacksConfig = {
  config_format_version: '1',
  global: {
    log_level: 'warn',
  },
  server: {
    url: '',
    api_token: '',
    auth_id: '',
    verify_ssl: false,
    version: 8,
  },
  custom_pack_authors: [],
  artifacts: {
    backend: 'none',
    strict_existence_checks: false,
  },
}
