/**
 * PlatformClient interface: public contract for talking to an XSOAR
 * platform instance and deploying content packs onto it.
 *
 * Create an instance via `createPlatformClient()` from platform-client-impl.ts.
 */

import type { ArtifactProvider } from '../../artifact-providers/artifact-provider.js'
import type { TlsPolicy } from '../../utils/tls.js'
import type { HttpMethod, HttpResponse, HttpTransport } from './http-transport.js'
import type { PackInstaller } from './pack-installer.js'
import type { InstalledPack, OutdatedPack } from './types.js'

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface UploadFile {
  filename: string
  content: Buffer
  contentType: string
}

export interface PlatformRequest {
  /** Path (and optional query string) appended to the server URL */
  endpoint: string
  method: HttpMethod
  /** JSON body */
  json?: unknown
  /** Multipart file fields; sent together with `data` as form fields */
  files?: Record<string, UploadFile>
  /** Form fields; urlencoded unless `files` is present */
  data?: Record<string, string>
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface PlatformClientOptions {
  serverUrl: string
  apiToken: string
  /** Tenant auth id sent as x-xdr-auth-id */
  authId?: string
  verifySsl?: TlsPolicy
  /** Platform major version */
  serverVersion: number
  /** Authors whose packs come from the artifact store */
  customPackAuthors?: readonly string[]
  timeoutMs?: number
}

export interface PlatformClientDeps {
  artifactProvider?: ArtifactProvider
  /** Transport for platform calls; defaults to NodeHttpTransport with the TLS policy */
  transport?: HttpTransport
  /** Transport for marketplace calls; defaults to NodeHttpTransport verifying TLS */
  marketplaceTransport?: HttpTransport
  installer?: PackInstaller
  /** Parent directory for deployment staging; defaults to os.tmpdir() */
  tempDir?: string
}

// ---------------------------------------------------------------------------
// PlatformClient interface
// ---------------------------------------------------------------------------

export interface PlatformClient {
  readonly serverUrl: string
  readonly serverVersion: number
  readonly artifactProvider: ArtifactProvider | undefined

  /**
   * Send one authenticated request to the platform. Resolves for every
   * HTTP status; callers decide what a non-2xx means.
   * @throws {TransportError} when no response arrives
   */
  authenticatedRequest(request: PlatformRequest): Promise<HttpResponse>

  /**
   * @throws {ConnectionFailureError} on transport failure or a non-2xx health response
   */
  testConnectivity(): Promise<boolean>

  /** Installed packs; fetched once, then served from memory. */
  getInstalledPacks(): Promise<InstalledPack[]>

  /** Installed packs with expiry and update information; fetched once. */
  getInstalledExpiredPacks(): Promise<InstalledPack[]>

  isInstalled(packId: string, packVersion?: string): Promise<boolean>

  isPackAvailable(packId: string, packVersion: string, custom: boolean): Promise<boolean>

  downloadPack(packId: string, packVersion: string, custom: boolean): Promise<Buffer>

  /**
   * Download a pack, stage it in a temporary directory and install it.
   * @throws {DeploymentFailureError} when the installer rejects the pack
   */
  deployPack(packId: string, packVersion: string, custom: boolean): Promise<boolean>

  getOutdatedPacks(): Promise<OutdatedPack[]>

  getLatestCustomPackVersion(packId: string): Promise<string>

  downloadItem(itemType: string, itemId: string): Promise<Buffer>
  attachItem(itemType: string, itemId: string): Promise<void>
  detachItem(itemType: string, itemId: string): Promise<void>

  getCase(caseId: string | number): Promise<unknown>
  createCase(data: Record<string, unknown>): Promise<unknown>
}
