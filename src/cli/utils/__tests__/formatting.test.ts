import { describe, it, expect } from 'vitest'
import {
  formatInstalledPacksTable,
  formatOutdatedPacksTable,
  formatTable,
} from '../formatting.js'
import { InstalledPackSchema } from '../../../modules/platform-client/types.js'

describe('formatTable', () => {
  it('renders only the header for no rows', () => {
    expect(formatTable(['A', 'Bee'], [], ['a', 'b'])).toBe('A | Bee\n--+----')
  })
})

describe('formatOutdatedPacksTable', () => {
  it('aligns columns to the widest value', () => {
    const table = formatOutdatedPacksTable([
      { id: 'AcmeTools', currentVersion: '2.0.0', latest: '2.1.0', author: 'Acme', custom: true },
      { id: 'Base', currentVersion: '1.0.0', latest: '1.2.0', author: 'Upstream', custom: false },
    ])
    expect(table.split('\n')).toEqual([
      'Pack      | Installed | Latest | Source',
      '----------+-----------+--------+---------',
      'AcmeTools | 2.0.0     | 2.1.0  | Acme',
      'Base      | 1.0.0     | 1.2.0  | Upstream',
    ])
  })
})

describe('formatInstalledPacksTable', () => {
  it('shows update availability as yes/no', () => {
    const table = formatInstalledPacksTable([
      InstalledPackSchema.parse({ id: 'Base', currentVersion: '1.2.0', author: 'Cortex XSOAR' }),
      InstalledPackSchema.parse({
        id: 'AcmeTools',
        currentVersion: '2.0.0',
        author: 'Acme',
        updateAvailable: true,
      }),
    ])
    expect(table.split('\n')).toEqual([
      'Pack      | Version | Author       | Update',
      '----------+---------+--------------+-------',
      'Base      | 1.2.0   | Cortex XSOAR | no',
      'AcmeTools | 2.0.0   | Acme         | yes',
    ])
  })
})
