import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { AzureArtifactProvider, AZURE_SAS_TOKEN_ENV, withSasToken } from '../azure-provider.js'
import {
  ConfigurationError,
  ConnectionFailureError,
  NoVersionsFoundError,
  NotFoundError,
  TransportError,
} from '../../core/errors.js'
import { FakeBlobGateway, sdkError } from './fakes.js'

let gateway: FakeBlobGateway
let savedToken: string | undefined

const factory = vi.fn((_url: string, _container: string, _sasToken: string) => gateway)

function makeProvider(
  options: { accessToken?: string; strictExistenceChecks?: boolean } = {}
): AzureArtifactProvider {
  return new AzureArtifactProvider({
    storageAccountUrl: 'https://acme.blob.core.windows.net/',
    containerName: 'packs',
    gatewayFactory: factory,
    ...options,
  })
}

beforeEach(() => {
  gateway = new FakeBlobGateway()
  factory.mockClear()
  savedToken = process.env[AZURE_SAS_TOKEN_ENV]
  delete process.env[AZURE_SAS_TOKEN_ENV]
})

afterEach(() => {
  if (savedToken === undefined) delete process.env[AZURE_SAS_TOKEN_ENV]
  else process.env[AZURE_SAS_TOKEN_ENV] = savedToken
})

describe('withSasToken', () => {
  it('appends the token as a query string', () => {
    expect(withSasToken('https://acme.blob.core.windows.net', 'sv=1&sig=test-secret')).toBe(
      'https://acme.blob.core.windows.net?sv=1&sig=test-secret'
    )
  })

  it('drops a leading question mark', () => {
    expect(withSasToken('https://acme.blob.core.windows.net', '?sv=1')).toBe(
      'https://acme.blob.core.windows.net?sv=1'
    )
  })
})

describe('AzureArtifactProvider', () => {
  it('reports the container location', () => {
    expect(makeProvider({ accessToken: 'test-secret' }).location).toBe(
      'https://acme.blob.core.windows.net/packs'
    )
  })

  describe('access token resolution', () => {
    it('does not require a token until first use', () => {
      expect(() => makeProvider()).not.toThrow()
      expect(factory).not.toHaveBeenCalled()
    })

    it('throws ConfigurationError on first use without a token', async () => {
      await expect(makeProvider().testConnection()).rejects.toBeInstanceOf(ConfigurationError)
      await expect(makeProvider().isAvailable('MyPack', '1.0.0')).rejects.toBeInstanceOf(
        ConfigurationError
      )
    })

    it('reads the token from the environment on first use', async () => {
      process.env[AZURE_SAS_TOKEN_ENV] = 'env-test-secret'
      await makeProvider().testConnection()
      expect(factory).toHaveBeenCalledWith(
        'https://acme.blob.core.windows.net/',
        'packs',
        'env-test-secret'
      )
    })

    it('prefers the constructor token', async () => {
      process.env[AZURE_SAS_TOKEN_ENV] = 'env-test-secret'
      await makeProvider({ accessToken: 'test-secret' }).testConnection()
      expect(factory).toHaveBeenCalledWith(
        'https://acme.blob.core.windows.net/',
        'packs',
        'test-secret'
      )
    })

    it('builds the container client once', async () => {
      const provider = makeProvider({ accessToken: 'test-secret' })
      await provider.testConnection()
      await provider.isAvailable('MyPack', '1.0.0')
      expect(factory).toHaveBeenCalledTimes(1)
    })
  })

  describe('storage operations', () => {
    it('checks and downloads the pack blob', async () => {
      gateway.put('content/packs/MyPack/2.0.0/MyPack.zip', 'blob-bytes')
      const provider = makeProvider({ accessToken: 'test-secret' })
      await expect(provider.isAvailable('MyPack', '2.0.0')).resolves.toBe(true)
      await expect(provider.isAvailable('MyPack', '2.0.1')).resolves.toBe(false)
      const body = await provider.download('MyPack', '2.0.0')
      expect(body.toString()).toBe('blob-bytes')
    })

    it('maps a missing blob to NotFoundError', async () => {
      const provider = makeProvider({ accessToken: 'test-secret' })
      await expect(provider.download('MyPack', '2.0.0')).rejects.toBeInstanceOf(NotFoundError)
    })

    it('returns false for transport errors unless strict', async () => {
      gateway.failWith = sdkError('Error', { code: 'ECONNRESET' })
      await expect(
        makeProvider({ accessToken: 'test-secret' }).isAvailable('MyPack', '1.0.0')
      ).resolves.toBe(false)
      await expect(
        makeProvider({ accessToken: 'test-secret', strictExistenceChecks: true }).isAvailable(
          'MyPack',
          '1.0.0'
        )
      ).rejects.toBeInstanceOf(TransportError)
    })

    it('returns the highest version among child prefixes', async () => {
      gateway.put('content/packs/MyPack/1.0.0/MyPack.zip', 'a')
      gateway.put('content/packs/MyPack/1.1.0/MyPack.zip', 'b')
      await expect(
        makeProvider({ accessToken: 'test-secret' }).getLatestVersion('MyPack')
      ).resolves.toBe('1.1.0')
    })

    it('throws NoVersionsFoundError for an empty listing', async () => {
      await expect(
        makeProvider({ accessToken: 'test-secret' }).getLatestVersion('MyPack')
      ).rejects.toBeInstanceOf(NoVersionsFoundError)
    })
  })

  it('classifies a rejected SAS token as incomplete credentials', async () => {
    gateway.failWith = Object.assign(sdkError('RestError', { code: 'AuthenticationFailed' }), {
      statusCode: 403,
    })
    await expect(makeProvider({ accessToken: 'test-secret' }).testConnection()).rejects.toMatchObject(
      { reason: 'incomplete_credentials' }
    )
    await expect(
      makeProvider({ accessToken: 'test-secret' }).testConnection()
    ).rejects.toBeInstanceOf(ConnectionFailureError)
  })
})
