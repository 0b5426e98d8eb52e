/**
 * Build the configured artifact provider from the `artifacts` config section.
 */

import { ConfigurationError } from '../core/errors.js'
import type { ArtifactsSettings } from '../modules/config/config-schema.js'
import type { ArtifactProvider } from './artifact-provider.js'
import { AzureArtifactProvider, type BlobGatewayFactory } from './azure-provider.js'
import { S3ArtifactProvider, type S3Gateway } from './s3-provider.js'

export interface ArtifactProviderFactoryDeps {
  s3Gateway?: S3Gateway
  blobGatewayFactory?: BlobGatewayFactory
}

/**
 * @returns the provider, or `undefined` when `backend` is `none`
 * @throws {ConfigurationError} when the selected backend has no settings section
 */
export function createArtifactProvider(
  artifacts: ArtifactsSettings,
  deps: ArtifactProviderFactoryDeps = {}
): ArtifactProvider | undefined {
  switch (artifacts.backend) {
    case 'none':
      return undefined
    case 's3': {
      const s3 = artifacts.s3
      if (s3 === undefined) {
        throw new ConfigurationError('artifacts.backend is "s3" but artifacts.s3 is not configured', {
          backend: 's3',
        })
      }
      return new S3ArtifactProvider({
        bucketName: s3.bucket_name,
        region: s3.region,
        verifySsl: s3.verify_ssl,
        strictExistenceChecks: artifacts.strict_existence_checks,
        gateway: deps.s3Gateway,
      })
    }
    case 'azure': {
      const azure = artifacts.azure
      if (azure === undefined) {
        throw new ConfigurationError(
          'artifacts.backend is "azure" but artifacts.azure is not configured',
          { backend: 'azure' }
        )
      }
      return new AzureArtifactProvider({
        storageAccountUrl: azure.storage_account_url,
        containerName: azure.container_name,
        accessToken: azure.access_token,
        strictExistenceChecks: artifacts.strict_existence_checks,
        gatewayFactory: deps.blobGatewayFactory,
      })
    }
    default: {
      const unknown: never = artifacts.backend
      throw new ConfigurationError(`Unknown artifact backend: ${String(unknown)}`, {
        backend: unknown,
      })
    }
  }
}
