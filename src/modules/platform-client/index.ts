/**
 * Barrel exports for the platform-client module.
 */

export {
  createPlatformClient,
  platformClientOptionsFromConfig,
  PlatformClientImpl,
} from './platform-client-impl.js'
export type {
  PlatformClient,
  PlatformClientOptions,
  PlatformClientDeps,
  PlatformRequest,
  UploadFile,
} from './platform-client.js'
export { NodeHttpTransport, DEFAULT_HTTP_TIMEOUT_MS, isSuccessStatus } from './http-transport.js'
export type { HttpTransport, HttpRequest, HttpResponse, HttpMethod } from './http-transport.js'
export { PlatformPackInstaller } from './pack-installer.js'
export type { PackInstaller, InstallOptions } from './pack-installer.js'
export {
  XSOAR_OLD_VERSION,
  MARKETPLACE_BASE_URL,
  SUPPORTED_ITEM_TYPES,
  platformEndpoints,
  marketplaceUrl,
  itemEndpoint,
} from './endpoints.js'
export type { PlatformEndpoints, ItemType, ItemAction } from './endpoints.js'
export { findOutdatedPacks } from './reconciliation.js'
export type { ReconciliationContext } from './reconciliation.js'
export { InstalledPackSchema, InstalledPackListSchema, UPSTREAM_AUTHOR } from './types.js'
export type { InstalledPack, OutdatedPack } from './types.js'
