import { describe, it, expect } from 'vitest'
import { itemEndpoint, marketplaceUrl, platformEndpoints } from '../endpoints.js'
import { UnsupportedItemTypeError } from '../../../core/errors.js'

describe('platformEndpoints', () => {
  it('uses the legacy surface up to version 6', () => {
    expect(platformEndpoints(5).installedPacks).toBe('/contentpacks/metadata/installed')
    expect(platformEndpoints(6).health).toBe('/health')
  })

  it('uses the prefixed surface above version 6', () => {
    const endpoints = platformEndpoints(8)
    expect(endpoints.health).toBe('/xsoar/health')
    expect(endpoints.installedExpiredPacks).toBe('/xsoar/contentpacks/installed-expired')
    expect(endpoints.packUpload).toBe('/xsoar/public/v1/contentpacks/installed/upload')
  })
})

describe('marketplaceUrl', () => {
  it('places the pack key under the marketplace host', () => {
    expect(marketplaceUrl('Base', '1.2.0')).toBe(
      'https://marketplace.xsoar.paloaltonetworks.com/content/packs/Base/1.2.0/Base.zip'
    )
  })
})

describe('itemEndpoint', () => {
  it('builds playbook paths', () => {
    expect(itemEndpoint('download', 'playbook', 'pb-1')).toBe('/playbook/pb-1/yaml')
    expect(itemEndpoint('attach', 'playbook', 'pb-1')).toBe('/playbook/attach/pb-1')
    expect(itemEndpoint('detach', 'playbook', 'pb-1')).toBe('/playbook/detach/pb-1')
  })

  it('escapes item ids', () => {
    expect(itemEndpoint('download', 'playbook', 'My Playbook')).toBe('/playbook/My%20Playbook/yaml')
  })

  it('rejects other item types', () => {
    expect(() => itemEndpoint('download', 'script', 's-1')).toThrow(UnsupportedItemTypeError)
  })
})
