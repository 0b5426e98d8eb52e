/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  XsoarPacksConfigSchema,
  PartialXsoarPacksConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  XsoarPacksConfig,
  PartialXsoarPacksConfig,
  ServerSettings,
  ArtifactsSettings,
  S3Settings,
  AzureSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export { requireServerCredentials } from './server-credentials.js'
export type { ServerCredentials } from './server-credentials.js'
