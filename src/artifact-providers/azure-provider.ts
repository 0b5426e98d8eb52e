/**
 * AzureArtifactProvider: artifact store backed by an Azure Blob Storage container.
 *
 * Authenticates with a SAS token taken from the constructor or, on first
 * use, from the AZURE_STORAGE_SAS_TOKEN environment variable.
 */

import { BlobServiceClient, type ContainerClient } from '@azure/storage-blob'
import { ConfigurationError } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'
import type { ArtifactProvider } from './artifact-provider.js'
import { packKey, packPrefix } from './artifact-provider.js'
import {
  fetchArtifact,
  latestFromPrefixes,
  listPrefixes,
  checkExists,
  toConnectionFailure,
} from './provider-utils.js'

const logger = createLogger('artifact-provider:azure')

export const AZURE_SAS_TOKEN_ENV = 'AZURE_STORAGE_SAS_TOKEN'

// ---------------------------------------------------------------------------
// Gateway: the Blob Storage calls this backend needs
// ---------------------------------------------------------------------------

export interface BlobGateway {
  getContainerProperties(): Promise<void>
  getBlobProperties(blobName: string): Promise<void>
  downloadBlob(blobName: string): Promise<Buffer>
  /** Immediate child "directory" prefixes under `prefix`. */
  listChildPrefixes(prefix: string): Promise<string[]>
}

export type BlobGatewayFactory = (
  storageAccountUrl: string,
  containerName: string,
  sasToken: string
) => BlobGateway

export class AzureBlobGateway implements BlobGateway {
  constructor(private readonly container: ContainerClient) {}

  async getContainerProperties(): Promise<void> {
    await this.container.getProperties()
  }

  async getBlobProperties(blobName: string): Promise<void> {
    await this.container.getBlobClient(blobName).getProperties()
  }

  downloadBlob(blobName: string): Promise<Buffer> {
    return this.container.getBlobClient(blobName).downloadToBuffer()
  }

  async listChildPrefixes(prefix: string): Promise<string[]> {
    const prefixes: string[] = []
    for await (const item of this.container.listBlobsByHierarchy('/', { prefix })) {
      if (item.kind === 'prefix') prefixes.push(item.name)
    }
    return prefixes
  }
}

/** Append a SAS token to the account URL. */
export function withSasToken(storageAccountUrl: string, sasToken: string): string {
  const query = sasToken.startsWith('?') ? sasToken.slice(1) : sasToken
  const separator = storageAccountUrl.includes('?') ? '&' : '?'
  return `${storageAccountUrl}${separator}${query}`
}

export const defaultBlobGatewayFactory: BlobGatewayFactory = (
  storageAccountUrl,
  containerName,
  sasToken
) => {
  const service = new BlobServiceClient(withSasToken(storageAccountUrl, sasToken))
  return new AzureBlobGateway(service.getContainerClient(containerName))
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export interface AzureArtifactProviderOptions {
  storageAccountUrl: string
  containerName: string
  /** SAS token; falls back to AZURE_STORAGE_SAS_TOKEN on first use */
  accessToken?: string
  strictExistenceChecks?: boolean
  gatewayFactory?: BlobGatewayFactory
}

export class AzureArtifactProvider implements ArtifactProvider {
  readonly backend = 'azure' as const
  readonly storageAccountUrl: string
  readonly containerName: string
  private accessToken: string
  private readonly strictExistenceChecks: boolean
  private readonly gatewayFactory: BlobGatewayFactory
  private _gateway: BlobGateway | undefined

  constructor(options: AzureArtifactProviderOptions) {
    this.storageAccountUrl = options.storageAccountUrl
    this.containerName = options.containerName
    this.accessToken = options.accessToken ?? ''
    this.strictExistenceChecks = options.strictExistenceChecks ?? false
    this.gatewayFactory = options.gatewayFactory ?? defaultBlobGatewayFactory
  }

  get location(): string {
    return `${this.storageAccountUrl.replace(/\/+$/, '')}/${this.containerName}`
  }

  private get gateway(): BlobGateway {
    if (this._gateway === undefined) {
      if (!this.accessToken) {
        const fromEnv = process.env[AZURE_SAS_TOKEN_ENV] ?? ''
        if (!fromEnv) {
          throw new ConfigurationError(
            `Cannot find access token. Either set the environment variable ${AZURE_SAS_TOKEN_ENV} or pass accessToken to the provider`,
            { backend: this.backend }
          )
        }
        this.accessToken = fromEnv
      }
      this._gateway = this.gatewayFactory(this.storageAccountUrl, this.containerName, this.accessToken)
      logger.debug({ container: this.containerName }, 'Blob container client initialized')
    }
    return this._gateway
  }

  async testConnection(): Promise<boolean> {
    const gateway = this.gateway
    try {
      await gateway.getContainerProperties()
    } catch (err) {
      throw toConnectionFailure(err, 'Azure Blob', this.location)
    }
    return true
  }

  async isAvailable(packId: string, packVersion: string): Promise<boolean> {
    const key = packKey(packId, packVersion)
    const gateway = this.gateway
    return checkExists(() => gateway.getBlobProperties(key), {
      strict: this.strictExistenceChecks,
      logger,
      key,
    })
  }

  async download(packId: string, packVersion: string): Promise<Buffer> {
    const key = packKey(packId, packVersion)
    const gateway = this.gateway
    return fetchArtifact(() => gateway.downloadBlob(key), key)
  }

  async getLatestVersion(packId: string): Promise<string> {
    const prefix = packPrefix(packId)
    const gateway = this.gateway
    const prefixes = await listPrefixes(() => gateway.listChildPrefixes(prefix), prefix)
    return latestFromPrefixes(packId, prefixes)
  }
}
