/**
 * Unit tests for the `xsoar-packs packs` command group
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  runPacksAvailable,
  runPacksDeploy,
  runPacksInstalled,
  runPacksLatest,
  runPacksOutdated,
  runPacksUpdate,
} from '../packs.js'
import { EXIT_ERROR, EXIT_INVALID, EXIT_SUCCESS } from '../../utils/command-context.js'
import { InstalledPackSchema } from '../../../modules/platform-client/types.js'
import { captureOutput, ScriptedClient, type CapturedOutput } from './helpers.js'

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

const OUTDATED = [
  { id: 'AcmeTools', currentVersion: '2.0.0', latest: '2.1.0', author: 'Acme', custom: true },
  { id: 'Base', currentVersion: '1.0.0', latest: '1.2.0', author: 'Upstream', custom: false },
]

// ---------------------------------------------------------------------------
// packs installed
// ---------------------------------------------------------------------------

describe('packs installed', () => {
  beforeEach(() => {
    client.installed = [
      InstalledPackSchema.parse({ id: 'Base', currentVersion: '1.2.0', author: 'Cortex XSOAR' }),
    ]
    client.installedExpired = [
      InstalledPackSchema.parse({
        id: 'Base',
        currentVersion: '1.2.0',
        author: 'Cortex XSOAR',
        updateAvailable: true,
        changelog: ['1.2.0', '1.3.0'],
      }),
    ]
  })

  it('prints a table by default', async () => {
    const exitCode = await runPacksInstalled({ client })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(output.getStdout()).toContain('Base | 1.2.0   | Cortex XSOAR | no')
  })

  it('prints JSON records', async () => {
    await runPacksInstalled({ client, output: 'json' })
    expect(JSON.parse(output.getStdout())).toEqual([
      {
        id: 'Base',
        currentVersion: '1.2.0',
        author: 'Cortex XSOAR',
        updateAvailable: false,
        changelog: [],
      },
    ])
  })

  it('lists the expired view on request', async () => {
    await runPacksInstalled({ client, output: 'json', expired: true })
    const records: unknown = JSON.parse(output.getStdout())
    expect(records).toMatchObject([{ updateAvailable: true, changelog: ['1.2.0', '1.3.0'] }])
  })

  it('rejects an unknown output format with exit code 2', async () => {
    const exitCode = await runPacksInstalled({ client, output: 'xml' })
    expect(exitCode).toBe(EXIT_INVALID)
    expect(output.getStderr()).toBe('Error: Unknown output format "xml". Use "table" or "json".\n')
  })

  it('says so when nothing is installed', async () => {
    client.installed = []
    await runPacksInstalled({ client })
    expect(output.getStdout()).toBe('No packs installed.\n')
  })
})

// ---------------------------------------------------------------------------
// packs outdated
// ---------------------------------------------------------------------------

describe('packs outdated', () => {
  it('prints the reconciliation report as JSON', async () => {
    client.outdated = OUTDATED
    const exitCode = await runPacksOutdated({ client, output: 'json' })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(JSON.parse(output.getStdout())).toEqual(OUTDATED)
  })

  it('reports when everything is current', async () => {
    await runPacksOutdated({ client })
    expect(output.getStdout()).toBe('All packs are up to date.\n')
  })
})

// ---------------------------------------------------------------------------
// packs available / latest / deploy
// ---------------------------------------------------------------------------

describe('packs available', () => {
  it('exits 0 for an available upstream pack', async () => {
    client.available.add('upstream:Base@1.2.0')
    const exitCode = await runPacksAvailable('Base', '1.2.0', { client })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(output.getStdout()).toBe('Base 1.2.0: available\n')
  })

  it('exits 1 when the pack is not available', async () => {
    client.available.add('upstream:AcmeTools@2.1.0')
    const exitCode = await runPacksAvailable('AcmeTools', '2.1.0', { client, custom: true })
    expect(exitCode).toBe(EXIT_ERROR)
    expect(output.getStdout()).toBe('AcmeTools 2.1.0: not available\n')
  })
})

describe('packs latest', () => {
  it('prints the latest stored version', async () => {
    client.latest.set('AcmeTools', '2.1.0')
    await runPacksLatest('AcmeTools', { client })
    expect(output.getStdout()).toBe('2.1.0\n')
  })
})

describe('packs deploy', () => {
  it('deploys from the requested source', async () => {
    const exitCode = await runPacksDeploy('AcmeTools', '2.1.0', { client, custom: true })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(client.deploys).toEqual([{ packId: 'AcmeTools', packVersion: '2.1.0', custom: true }])
    expect(output.getStdout()).toBe('Deployed AcmeTools 2.1.0\n')
  })

  it('reports a deployment failure with exit code 1', async () => {
    client.failingDeploys.add('Base')
    const exitCode = await runPacksDeploy('Base', '1.2.0', { client })
    expect(exitCode).toBe(EXIT_ERROR)
    expect(output.getStderr()).toBe('Error: Failed to deploy Base 1.2.0: rejected\n')
  })
})

// ---------------------------------------------------------------------------
// packs update
// ---------------------------------------------------------------------------

describe('packs update', () => {
  beforeEach(() => {
    client.outdated = OUTDATED
  })

  it('deploys every outdated pack from its source', async () => {
    const exitCode = await runPacksUpdate({ client })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(client.deploys).toEqual([
      { packId: 'AcmeTools', packVersion: '2.1.0', custom: true },
      { packId: 'Base', packVersion: '1.2.0', custom: false },
    ])
    expect(output.getStdout()).toBe(
      'Updated AcmeTools 2.0.0 -> 2.1.0\nUpdated Base 1.0.0 -> 1.2.0\n\n2 of 2 pack(s) updated.\n'
    )
  })

  it('deploys from the artifact store when a custom author is named Upstream', async () => {
    client.outdated = [
      { id: 'HomeGrown', currentVersion: '1.0.0', latest: '1.1.0', author: 'Upstream', custom: true },
    ]
    await runPacksUpdate({ client })
    expect(client.deploys).toEqual([{ packId: 'HomeGrown', packVersion: '1.1.0', custom: true }])
  })

  it('continues past a failed pack and exits 1', async () => {
    client.failingDeploys.add('AcmeTools')
    const exitCode = await runPacksUpdate({ client })
    expect(exitCode).toBe(EXIT_ERROR)
    expect(client.deploys.map((call) => call.packId)).toEqual(['AcmeTools', 'Base'])
    expect(output.getStdout()).toBe('Updated Base 1.0.0 -> 1.2.0\n\n1 of 2 pack(s) updated.\n')
    expect(output.getStderr()).toBe(
      'Failed to update AcmeTools: Failed to deploy AcmeTools 2.1.0: rejected\nFailed: AcmeTools\n'
    )
  })

  it('only lists packs on a dry run', async () => {
    const exitCode = await runPacksUpdate({ client, dryRun: true })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(client.deploys).toEqual([])
    expect(output.getStdout()).toContain('2 pack(s) would be updated.')
  })

  it('does nothing when everything is current', async () => {
    client.outdated = []
    await runPacksUpdate({ client })
    expect(output.getStdout()).toBe('All packs are up to date.\n')
  })
})
