/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  XsoarPacksConfigSchema,
  PartialXsoarPacksConfigSchema,
  ServerSettingsSchema,
  ArtifactsSettingsSchema,
  TlsPolicySchema,
} from '../config-schema.js'
import type { XsoarPacksConfig } from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

function makeValidConfig(overrides: Partial<XsoarPacksConfig> = {}): XsoarPacksConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
  }
}

describe('XsoarPacksConfigSchema', () => {
  it('accepts the built-in default config', () => {
    expect(XsoarPacksConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects unknown config_format_version', () => {
    const cfg = { ...makeValidConfig(), config_format_version: '2' }
    expect(XsoarPacksConfigSchema.safeParse(cfg).success).toBe(false)
  })

  it('rejects unknown top-level keys', () => {
    const cfg = { ...makeValidConfig(), providers: {} }
    expect(XsoarPacksConfigSchema.safeParse(cfg).success).toBe(false)
  })

  it('accepts a fully populated azure configuration', () => {
    const cfg = makeValidConfig({
      custom_pack_authors: ['Acme'],
      artifacts: {
        backend: 'azure',
        strict_existence_checks: true,
        azure: {
          storage_account_url: 'https://acme.blob.core.windows.net',
          container_name: 'packs',
        },
      },
    })
    expect(XsoarPacksConfigSchema.safeParse(cfg).success).toBe(true)
  })
})

describe('ServerSettingsSchema', () => {
  const valid = {
    url: 'https://xsoar.example.test',
    api_token: 'test-token',
    auth_id: '',
    verify_ssl: true,
    version: 6,
  }

  it('accepts valid server settings', () => {
    expect(ServerSettingsSchema.safeParse(valid).success).toBe(true)
  })

  it('rejects a non-integer version', () => {
    expect(ServerSettingsSchema.safeParse({ ...valid, version: 6.5 }).success).toBe(false)
  })

  it('rejects version 0', () => {
    expect(ServerSettingsSchema.safeParse({ ...valid, version: 0 }).success).toBe(false)
  })
})

describe('TlsPolicySchema', () => {
  it('accepts booleans and CA bundle paths', () => {
    expect(TlsPolicySchema.safeParse(true).success).toBe(true)
    expect(TlsPolicySchema.safeParse(false).success).toBe(true)
    expect(TlsPolicySchema.safeParse('/etc/ssl/ca.pem').success).toBe(true)
  })

  it('rejects an empty path', () => {
    expect(TlsPolicySchema.safeParse('').success).toBe(false)
  })
})

describe('ArtifactsSettingsSchema', () => {
  it('rejects an unknown backend', () => {
    const result = ArtifactsSettingsSchema.safeParse({
      backend: 'gcs',
      strict_existence_checks: false,
    })
    expect(result.success).toBe(false)
  })

  it('rejects an azure url that is not a URL', () => {
    const result = ArtifactsSettingsSchema.safeParse({
      backend: 'azure',
      strict_existence_checks: false,
      azure: { storage_account_url: 'not a url', container_name: 'packs' },
    })
    expect(result.success).toBe(false)
  })
})

describe('PartialXsoarPacksConfigSchema', () => {
  it('accepts an empty document', () => {
    expect(PartialXsoarPacksConfigSchema.safeParse({}).success).toBe(true)
  })

  it('accepts a partial s3 section', () => {
    const result = PartialXsoarPacksConfigSchema.safeParse({
      artifacts: { s3: { bucket_name: 'packs-bucket' } },
    })
    expect(result.success).toBe(true)
  })

  it('rejects unknown nested keys', () => {
    const result = PartialXsoarPacksConfigSchema.safeParse({ server: { password: 'x' } })
    expect(result.success).toBe(false)
  })
})
