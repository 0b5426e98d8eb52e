export type { ArtifactProvider, ArtifactBackend } from './artifact-provider.js'
export { PACKS_ROOT, packKey, packPrefix, versionFromPrefix } from './artifact-provider.js'
export { S3ArtifactProvider, AwsS3Gateway } from './s3-provider.js'
export type { S3Gateway, S3ArtifactProviderOptions } from './s3-provider.js'
export {
  AzureArtifactProvider,
  AzureBlobGateway,
  AZURE_SAS_TOKEN_ENV,
  withSasToken,
} from './azure-provider.js'
export type {
  BlobGateway,
  BlobGatewayFactory,
  AzureArtifactProviderOptions,
} from './azure-provider.js'
export { createArtifactProvider } from './provider-factory.js'
export type { ArtifactProviderFactoryDeps } from './provider-factory.js'
