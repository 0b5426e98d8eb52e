/**
 * S3ArtifactProvider: artifact store backed by an AWS S3 bucket.
 *
 * Authenticates with the ambient AWS credential chain (environment, shared
 * config, instance or task role). The SDK client is created on first use and
 * reused for the lifetime of the provider.
 */

import { Agent } from 'https'
import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from '@aws-sdk/client-s3'
import { TransportError } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'
import { tlsAgentOptions, type TlsPolicy } from '../utils/tls.js'
import type { ArtifactProvider } from './artifact-provider.js'
import { packKey, packPrefix } from './artifact-provider.js'
import {
  fetchArtifact,
  latestFromPrefixes,
  listPrefixes,
  checkExists,
  toConnectionFailure,
} from './provider-utils.js'

const logger = createLogger('artifact-provider:s3')

// ---------------------------------------------------------------------------
// Gateway: the S3 calls this backend needs
// ---------------------------------------------------------------------------

export interface S3Gateway {
  headBucket(bucket: string): Promise<void>
  headObject(bucket: string, key: string): Promise<void>
  getObject(bucket: string, key: string): Promise<Buffer>
  /** Immediate child prefixes of `prefix`, following pagination. */
  listCommonPrefixes(bucket: string, prefix: string): Promise<string[]>
}

export class AwsS3Gateway implements S3Gateway {
  constructor(private readonly client: S3Client) {}

  async headBucket(bucket: string): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: bucket }))
  }

  async headObject(bucket: string, key: string): Promise<void> {
    await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }))
  }

  async getObject(bucket: string, key: string): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }))
    if (response.Body === undefined) {
      throw new TransportError(`Empty response body for s3://${bucket}/${key}`, { bucket, key })
    }
    return Buffer.from(await response.Body.transformToByteArray())
  }

  async listCommonPrefixes(bucket: string, prefix: string): Promise<string[]> {
    const prefixes: string[] = []
    let continuationToken: string | undefined
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          Delimiter: '/',
          ContinuationToken: continuationToken,
        })
      )
      for (const entry of page.CommonPrefixes ?? []) {
        if (entry.Prefix !== undefined) prefixes.push(entry.Prefix)
      }
      continuationToken = page.IsTruncated === true ? page.NextContinuationToken : undefined
    } while (continuationToken !== undefined)
    return prefixes
  }
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export interface S3ArtifactProviderOptions {
  bucketName: string
  /** AWS region; the SDK's own resolution applies when omitted */
  region?: string
  verifySsl?: TlsPolicy
  timeoutMs?: number
  strictExistenceChecks?: boolean
  /** Pre-built gateway; skips lazy SDK client creation */
  gateway?: S3Gateway
}

export class S3ArtifactProvider implements ArtifactProvider {
  readonly backend = 's3' as const
  readonly bucketName: string
  private readonly region: string | undefined
  private readonly verifySsl: TlsPolicy
  private readonly timeoutMs: number
  private readonly strictExistenceChecks: boolean
  private _gateway: S3Gateway | undefined

  constructor(options: S3ArtifactProviderOptions) {
    this.bucketName = options.bucketName
    this.region = options.region
    this.verifySsl = options.verifySsl ?? true
    this.timeoutMs = options.timeoutMs ?? 10_000
    this.strictExistenceChecks = options.strictExistenceChecks ?? false
    this._gateway = options.gateway
  }

  get location(): string {
    return `s3://${this.bucketName}`
  }

  private get gateway(): S3Gateway {
    if (this._gateway === undefined) {
      const client = new S3Client({
        ...(this.region !== undefined && { region: this.region }),
        requestHandler: {
          httpsAgent: new Agent(tlsAgentOptions(this.verifySsl)),
          connectionTimeout: this.timeoutMs,
          requestTimeout: this.timeoutMs,
        },
      })
      this._gateway = new AwsS3Gateway(client)
      logger.debug({ bucket: this.bucketName }, 'S3 client initialized')
    }
    return this._gateway
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.gateway.headBucket(this.bucketName)
    } catch (err) {
      throw toConnectionFailure(err, 'S3', this.location)
    }
    return true
  }

  async isAvailable(packId: string, packVersion: string): Promise<boolean> {
    const key = packKey(packId, packVersion)
    const gateway = this.gateway
    return checkExists(() => gateway.headObject(this.bucketName, key), {
      strict: this.strictExistenceChecks,
      logger,
      key,
    })
  }

  async download(packId: string, packVersion: string): Promise<Buffer> {
    const key = packKey(packId, packVersion)
    const gateway = this.gateway
    return fetchArtifact(() => gateway.getObject(this.bucketName, key), key)
  }

  async getLatestVersion(packId: string): Promise<string> {
    const prefix = packPrefix(packId)
    const gateway = this.gateway
    const prefixes = await listPrefixes(
      () => gateway.listCommonPrefixes(this.bucketName, prefix),
      prefix
    )
    return latestFromPrefixes(packId, prefixes)
  }
}
