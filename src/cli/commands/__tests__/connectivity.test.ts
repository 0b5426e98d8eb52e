import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { runConnectivityCommand } from '../connectivity.js'
import { EXIT_ERROR, EXIT_INVALID, EXIT_SUCCESS } from '../../utils/command-context.js'
import { S3ArtifactProvider } from '../../../artifact-providers/s3-provider.js'
import { FakeS3Gateway, sdkError } from '../../../artifact-providers/__tests__/fakes.js'
import { captureOutput, ScriptedClient, type CapturedOutput } from './helpers.js'
import { mkdtemp, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'

let client: ScriptedClient
let output: CapturedOutput

beforeEach(() => {
  client = new ScriptedClient()
  output = captureOutput()
})

afterEach(() => {
  output.restore()
  vi.restoreAllMocks()
})

describe('connectivity', () => {
  it('reports the server and a missing artifact store', async () => {
    const exitCode = await runConnectivityCommand({ client })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(output.getStdout()).toBe(
      'XSOAR server: OK (https://xsoar.example.test)\nArtifact store: not configured\n'
    )
  })

  it('checks the artifact store when configured', async () => {
    client.artifactProvider = new S3ArtifactProvider({
      bucketName: 'packs-bucket',
      gateway: new FakeS3Gateway(),
    })
    await runConnectivityCommand({ client })
    expect(output.getStdout()).toContain('Artifact store: OK (s3://packs-bucket)\n')
  })

  it('fails when the server is unreachable', async () => {
    client.reachable = false
    const exitCode = await runConnectivityCommand({ client })
    expect(exitCode).toBe(EXIT_ERROR)
    expect(output.getStderr()).toBe('Error: Failed to connect to XSOAR server\n')
  })

  it('fails when the artifact store rejects the credentials', async () => {
    const gateway = new FakeS3Gateway()
    gateway.failWith = sdkError('CredentialsProviderError')
    client.artifactProvider = new S3ArtifactProvider({ bucketName: 'packs-bucket', gateway })
    const exitCode = await runConnectivityCommand({ client })
    expect(exitCode).toBe(EXIT_ERROR)
    expect(output.getStderr()).toContain('credentials not found')
  })

  it('exits 2 when the server is not configured', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'xsoar-packs-connectivity-'))
    const saved = { url: process.env.DEMISTO_BASE_URL, key: process.env.DEMISTO_API_KEY }
    delete process.env.DEMISTO_BASE_URL
    delete process.env.DEMISTO_API_KEY
    try {
      const exitCode = await runConnectivityCommand({
        projectConfigDir: join(dir, 'project'),
        globalConfigDir: join(dir, 'global'),
      })
      expect(exitCode).toBe(EXIT_INVALID)
      expect(output.getStderr()).toMatch(/^Error: Both server.url and server.api_token are required/)
    } finally {
      if (saved.url !== undefined) process.env.DEMISTO_BASE_URL = saved.url
      if (saved.key !== undefined) process.env.DEMISTO_API_KEY = saved.key
      await rm(dir, { recursive: true, force: true })
    }
  })
})
