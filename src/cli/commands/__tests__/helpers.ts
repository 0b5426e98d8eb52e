/**
 * Shared helpers for command tests: a scripted PlatformClient and
 * stdout/stderr capture.
 */

import { vi } from 'vitest'
import type { ArtifactProvider } from '../../../artifact-providers/artifact-provider.js'
import { ConnectionFailureError, DeploymentFailureError } from '../../../core/errors.js'
import type { HttpResponse } from '../../../modules/platform-client/http-transport.js'
import type { PlatformClient } from '../../../modules/platform-client/platform-client.js'
import type { InstalledPack, OutdatedPack } from '../../../modules/platform-client/types.js'
import { itemEndpoint } from '../../../modules/platform-client/endpoints.js'

export interface DeployCall {
  packId: string
  packVersion: string
  custom: boolean
}

export class ScriptedClient implements PlatformClient {
  readonly serverUrl = 'https://xsoar.example.test'
  readonly serverVersion = 8
  artifactProvider: ArtifactProvider | undefined

  installed: InstalledPack[] = []
  installedExpired: InstalledPack[] = []
  outdated: OutdatedPack[] = []
  available = new Set<string>()
  latest = new Map<string, string>()
  reachable = true
  /** Pack ids whose deployment fails */
  failingDeploys = new Set<string>()
  readonly deploys: DeployCall[] = []
  readonly itemCalls: string[] = []
  readonly createdCases: Record<string, unknown>[] = []

  async authenticatedRequest(): Promise<HttpResponse> {
    return { status: 200, headers: {}, body: Buffer.alloc(0) }
  }

  async testConnectivity(): Promise<boolean> {
    if (!this.reachable) {
      throw new ConnectionFailureError('Failed to connect to XSOAR server', 'endpoint_unreachable')
    }
    return true
  }

  async getInstalledPacks(): Promise<InstalledPack[]> {
    return this.installed
  }

  async getInstalledExpiredPacks(): Promise<InstalledPack[]> {
    return this.installedExpired
  }

  async isInstalled(packId: string, packVersion?: string): Promise<boolean> {
    return this.installed.some(
      (pack) => pack.id === packId && (!packVersion || pack.currentVersion === packVersion)
    )
  }

  async isPackAvailable(packId: string, packVersion: string, custom: boolean): Promise<boolean> {
    return this.available.has(`${custom ? 'custom' : 'upstream'}:${packId}@${packVersion}`)
  }

  async downloadPack(): Promise<Buffer> {
    return Buffer.from('zip')
  }

  async deployPack(packId: string, packVersion: string, custom: boolean): Promise<boolean> {
    this.deploys.push({ packId, packVersion, custom })
    if (this.failingDeploys.has(packId)) {
      throw new DeploymentFailureError(`Failed to deploy ${packId} ${packVersion}: rejected`)
    }
    return true
  }

  async getOutdatedPacks(): Promise<OutdatedPack[]> {
    return this.outdated
  }

  async getLatestCustomPackVersion(packId: string): Promise<string> {
    return this.latest.get(packId) ?? '0.0.0'
  }

  async downloadItem(itemType: string, itemId: string): Promise<Buffer> {
    this.itemCalls.push(itemEndpoint('download', itemType, itemId))
    return Buffer.from(`id: ${itemId}\n`)
  }

  async attachItem(itemType: string, itemId: string): Promise<void> {
    this.itemCalls.push(itemEndpoint('attach', itemType, itemId))
  }

  async detachItem(itemType: string, itemId: string): Promise<void> {
    this.itemCalls.push(itemEndpoint('detach', itemType, itemId))
  }

  async getCase(caseId: string | number): Promise<unknown> {
    return { total: 1, data: [{ id: String(caseId) }] }
  }

  async createCase(data: Record<string, unknown>): Promise<unknown> {
    this.createdCases.push(data)
    return { id: '100', ...data }
  }
}

export interface CapturedOutput {
  getStdout: () => string
  getStderr: () => string
  restore: () => void
}

export function captureOutput(): CapturedOutput {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  return {
    getStdout: () => stdout,
    getStderr: () => stderr,
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}
