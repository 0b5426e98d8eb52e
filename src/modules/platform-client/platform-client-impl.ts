/**
 * PlatformClient implementation.
 *
 * All platform traffic goes through `authenticatedRequest`; marketplace
 * traffic goes through a separate transport that always verifies TLS.
 * Installed-pack listings are fetched once per client and then served from
 * memory.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import FormData from 'form-data'
import { z } from 'zod'
import {
  ConfigurationError,
  ConnectionFailureError,
  DeploymentFailureError,
  TransportError,
  type ConnectionFailureReason,
} from '../../core/errors.js'
import type { ArtifactProvider } from '../../artifact-providers/artifact-provider.js'
import { classifyConnectionError, errorMessage } from '../../artifact-providers/provider-utils.js'
import { createLogger } from '../../utils/logger.js'
import type { XsoarPacksConfig } from '../config/config-schema.js'
import { requireServerCredentials } from '../config/server-credentials.js'
import {
  itemEndpoint,
  marketplaceUrl,
  platformEndpoints,
  type PlatformEndpoints,
} from './endpoints.js'
import {
  NodeHttpTransport,
  isSuccessStatus,
  type HttpResponse,
  type HttpTransport,
} from './http-transport.js'
import { PlatformPackInstaller, type PackInstaller } from './pack-installer.js'
import { findOutdatedPacks } from './reconciliation.js'
import { ensureOk, parseJsonBody } from './responses.js'
import { InstalledPackListSchema, type InstalledPack, type OutdatedPack } from './types.js'
import type {
  PlatformClient,
  PlatformClientDeps,
  PlatformClientOptions,
  PlatformRequest,
} from './platform-client.js'

const logger = createLogger('platform-client')

const JsonValueSchema = z.unknown()

// ---------------------------------------------------------------------------
// Request body encoding
// ---------------------------------------------------------------------------

interface EncodedBody {
  headers: Record<string, string>
  body?: Buffer | string
}

function encodeBody(request: PlatformRequest): EncodedBody {
  if (request.files !== undefined) {
    const form = new FormData()
    for (const [field, value] of Object.entries(request.data ?? {})) {
      form.append(field, value)
    }
    for (const [field, file] of Object.entries(request.files)) {
      form.append(field, file.content, { filename: file.filename, contentType: file.contentType })
    }
    return { headers: form.getHeaders(), body: form.getBuffer() }
  }
  if (request.data !== undefined) {
    return {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams(request.data).toString(),
    }
  }
  if (request.json !== undefined) {
    return { headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(request.json) }
  }
  return { headers: { 'Content-Type': 'application/json' } }
}

function healthFailureReason(status: number): ConnectionFailureReason {
  return status === 401 || status === 403 ? 'incomplete_credentials' : 'request_failed'
}

// ---------------------------------------------------------------------------
// PlatformClientImpl
// ---------------------------------------------------------------------------

/** Staged file name for a pack; anything outside [A-Za-z0-9._-] becomes "_", so no separator survives. */
export function stagingFileName(packId: string): string {
  return `${packId.replace(/[^A-Za-z0-9._-]/g, '_')}.zip`
}

export class PlatformClientImpl implements PlatformClient {
  readonly serverUrl: string
  readonly serverVersion: number
  readonly artifactProvider: ArtifactProvider | undefined
  private readonly apiToken: string
  private readonly authId: string
  private readonly customPackAuthors: ReadonlySet<string>
  private readonly endpoints: PlatformEndpoints
  private readonly transport: HttpTransport
  private readonly marketplaceTransport: HttpTransport
  private readonly installer: PackInstaller
  private readonly tempDir: string

  private installedPacks: InstalledPack[] | undefined
  private installedExpiredPacks: InstalledPack[] | undefined

  constructor(options: PlatformClientOptions, deps: PlatformClientDeps = {}) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, '')
    this.apiToken = options.apiToken
    this.authId = options.authId ?? ''
    this.serverVersion = options.serverVersion
    this.customPackAuthors = new Set(options.customPackAuthors ?? [])
    this.endpoints = platformEndpoints(options.serverVersion)
    this.artifactProvider = deps.artifactProvider
    this.transport =
      deps.transport ??
      new NodeHttpTransport({ verifySsl: options.verifySsl ?? false, timeoutMs: options.timeoutMs })
    this.marketplaceTransport =
      deps.marketplaceTransport ??
      new NodeHttpTransport({ verifySsl: true, timeoutMs: options.timeoutMs })
    this.installer =
      deps.installer ??
      new PlatformPackInstaller((request) => this.authenticatedRequest(request), options.serverVersion)
    this.tempDir = deps.tempDir ?? tmpdir()
  }

  // -- Transport -------------------------------------------------------------

  async authenticatedRequest(request: PlatformRequest): Promise<HttpResponse> {
    const encoded = encodeBody(request)
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: this.apiToken,
      ...encoded.headers,
    }
    if (this.authId) headers['x-xdr-auth-id'] = this.authId

    logger.debug({ method: request.method, endpoint: request.endpoint }, 'Platform request')
    return this.transport.request({
      url: `${this.serverUrl}${request.endpoint}`,
      method: request.method,
      headers,
      body: encoded.body,
    })
  }

  async testConnectivity(): Promise<boolean> {
    let response: HttpResponse
    try {
      response = await this.authenticatedRequest({ endpoint: this.endpoints.health, method: 'GET' })
    } catch (err) {
      const cause = err instanceof TransportError ? err.cause : err
      const reason = classifyConnectionError(cause)
      throw new ConnectionFailureError(
        `Failed to connect to XSOAR server at ${this.serverUrl}: ${errorMessage(err)}`,
        reason,
        { serverUrl: this.serverUrl },
        err
      )
    }
    if (!isSuccessStatus(response.status)) {
      throw new ConnectionFailureError(
        `Failed to connect to XSOAR server at ${this.serverUrl}: health check returned HTTP ${String(response.status)}`,
        healthFailureReason(response.status),
        { serverUrl: this.serverUrl, status: response.status }
      )
    }
    return true
  }

  // -- Installed packs -------------------------------------------------------

  async getInstalledPacks(): Promise<InstalledPack[]> {
    if (this.installedPacks === undefined) {
      this.installedPacks = await this.fetchPackList(this.endpoints.installedPacks, 'Installed packs')
    }
    return this.installedPacks
  }

  async getInstalledExpiredPacks(): Promise<InstalledPack[]> {
    if (this.installedExpiredPacks === undefined) {
      this.installedExpiredPacks = await this.fetchPackList(
        this.endpoints.installedExpiredPacks,
        'Installed expired packs'
      )
    }
    return this.installedExpiredPacks
  }

  async isInstalled(packId: string, packVersion?: string): Promise<boolean> {
    const installed = await this.getInstalledPacks()
    return installed.some(
      (pack) => pack.id === packId && (!packVersion || pack.currentVersion === packVersion)
    )
  }

  // -- Pack artifacts --------------------------------------------------------

  async isPackAvailable(packId: string, packVersion: string, custom: boolean): Promise<boolean> {
    if (custom) {
      return this.requireProvider().isAvailable(packId, packVersion)
    }
    const url = marketplaceUrl(packId, packVersion)
    try {
      const response = await this.marketplaceTransport.request({ url, method: 'HEAD' })
      return response.status === 200
    } catch (err) {
      logger.debug({ url, err }, 'Marketplace availability check failed; treating as unavailable')
      return false
    }
  }

  async downloadPack(packId: string, packVersion: string, custom: boolean): Promise<Buffer> {
    if (custom) {
      return this.requireProvider().download(packId, packVersion)
    }
    const url = marketplaceUrl(packId, packVersion)
    const response = await this.marketplaceTransport.request({ url, method: 'GET', maxRedirects: 5 })
    ensureOk(response, `Marketplace download of ${packId} ${packVersion}`, {
      notFoundIsDistinct: true,
    })
    return response.body
  }

  async deployPack(packId: string, packVersion: string, custom: boolean): Promise<boolean> {
    const content = await this.downloadPack(packId, packVersion, custom)
    const stagingDir = await mkdtemp(join(this.tempDir, 'xsoar-pack-'))
    try {
      const filePath = join(stagingDir, stagingFileName(packId))
      await writeFile(filePath, content)
      try {
        await this.installer.install(filePath, { skipValidation: custom, skipVerify: custom })
      } catch (err) {
        throw new DeploymentFailureError(
          `Failed to deploy ${packId} ${packVersion}: ${errorMessage(err)}`,
          { packId, packVersion, custom },
          err
        )
      }
    } finally {
      await rm(stagingDir, { recursive: true, force: true })
    }
    logger.info({ packId, packVersion, custom }, 'Pack deployed')
    return true
  }

  async getOutdatedPacks(): Promise<OutdatedPack[]> {
    const expired = await this.getInstalledExpiredPacks()
    return findOutdatedPacks(expired, {
      customPackAuthors: this.customPackAuthors,
      artifactProvider: this.artifactProvider,
      logger,
    })
  }

  async getLatestCustomPackVersion(packId: string): Promise<string> {
    return this.requireProvider().getLatestVersion(packId)
  }

  // -- Content items ---------------------------------------------------------

  async downloadItem(itemType: string, itemId: string): Promise<Buffer> {
    const endpoint = itemEndpoint('download', itemType, itemId)
    const response = await this.authenticatedRequest({ endpoint, method: 'GET' })
    return ensureOk(response, `Download of ${itemType} ${itemId}`).body
  }

  async attachItem(itemType: string, itemId: string): Promise<void> {
    const endpoint = itemEndpoint('attach', itemType, itemId)
    const response = await this.authenticatedRequest({ endpoint, method: 'POST' })
    ensureOk(response, `Attach of ${itemType} ${itemId}`)
  }

  async detachItem(itemType: string, itemId: string): Promise<void> {
    const endpoint = itemEndpoint('detach', itemType, itemId)
    const response = await this.authenticatedRequest({ endpoint, method: 'POST' })
    ensureOk(response, `Detach of ${itemType} ${itemId}`)
  }

  // -- Cases -----------------------------------------------------------------

  async getCase(caseId: string | number): Promise<unknown> {
    const response = await this.authenticatedRequest({
      endpoint: this.endpoints.caseSearch,
      method: 'POST',
      json: { filter: { query: `id:${String(caseId)}` } },
    })
    const what = `Case lookup ${String(caseId)}`
    return parseJsonBody(ensureOk(response, what), JsonValueSchema, what)
  }

  async createCase(data: Record<string, unknown>): Promise<unknown> {
    const response = await this.authenticatedRequest({
      endpoint: this.endpoints.caseCreate,
      method: 'POST',
      json: data,
    })
    return parseJsonBody(ensureOk(response, 'Case creation'), JsonValueSchema, 'Case creation')
  }

  // -- Private helpers -------------------------------------------------------

  private requireProvider(): ArtifactProvider {
    if (this.artifactProvider === undefined) {
      throw new ConfigurationError(
        'Custom packs need an artifact provider; set artifacts.backend to "s3" or "azure"'
      )
    }
    return this.artifactProvider
  }

  private async fetchPackList(endpoint: string, what: string): Promise<InstalledPack[]> {
    const response = await this.authenticatedRequest({ endpoint, method: 'GET' })
    return parseJsonBody(ensureOk(response, what), InstalledPackListSchema, what)
  }
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createPlatformClient(
  options: PlatformClientOptions,
  deps: PlatformClientDeps = {}
): PlatformClient {
  return new PlatformClientImpl(options, deps)
}

/**
 * Map the loaded configuration onto client options.
 * @throws {ConfigurationError} when server credentials are missing
 */
export function platformClientOptionsFromConfig(config: XsoarPacksConfig): PlatformClientOptions {
  const { serverUrl, apiToken, authId } = requireServerCredentials(config.server)
  return {
    serverUrl,
    apiToken,
    authId,
    verifySsl: config.server.verify_ssl,
    serverVersion: config.server.version,
    customPackAuthors: config.custom_pack_authors,
  }
}
