/**
 * Zod validation schemas for the xsoar-packs configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - platform server connection
 *  - artifact store backend selection and per-backend settings
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

/** `true`/`false`, or the path of a CA bundle to verify against */
export const TlsPolicySchema = z.union([z.boolean(), z.string().min(1)])

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Platform server
// ---------------------------------------------------------------------------

export const ServerSettingsSchema = z
  .object({
    /** Base URL of the platform; empty until supplied by file, env or flag */
    url: z.string(),
    api_token: z.string(),
    /** Tenant auth id sent as x-xdr-auth-id (newer platforms only) */
    auth_id: z.string(),
    verify_ssl: TlsPolicySchema,
    /** Platform major version; 6 and below use the older API surface */
    version: z.number().int().min(1),
  })
  .strict()

export type ServerSettings = z.infer<typeof ServerSettingsSchema>

// ---------------------------------------------------------------------------
// Artifact store
// ---------------------------------------------------------------------------

export const ArtifactBackendSchema = z.enum(['none', 's3', 'azure'])
export type ArtifactBackendSetting = z.infer<typeof ArtifactBackendSchema>

export const S3SettingsSchema = z
  .object({
    bucket_name: z.string().min(1),
    region: z.string().min(1).optional(),
    verify_ssl: TlsPolicySchema.optional(),
  })
  .strict()

export type S3Settings = z.infer<typeof S3SettingsSchema>

export const AzureSettingsSchema = z
  .object({
    storage_account_url: z.string().url(),
    container_name: z.string().min(1),
    /** SAS token; AZURE_STORAGE_SAS_TOKEN is used when absent */
    access_token: z.string().optional(),
  })
  .strict()

export type AzureSettings = z.infer<typeof AzureSettingsSchema>

export const ArtifactsSettingsSchema = z
  .object({
    backend: ArtifactBackendSchema,
    /** Surface existence-check transport errors instead of reporting absence */
    strict_existence_checks: z.boolean(),
    s3: S3SettingsSchema.optional(),
    azure: AzureSettingsSchema.optional(),
  })
  .strict()

export type ArtifactsSettings = z.infer<typeof ArtifactsSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const XsoarPacksConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    server: ServerSettingsSchema,
    /** Pack authors whose packs are sourced from the private artifact store */
    custom_pack_authors: z.array(z.string().min(1)),
    artifacts: ArtifactsSettingsSchema,
  })
  .strict()

export type XsoarPacksConfig = z.infer<typeof XsoarPacksConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (allows partial documents during load before merging)
// ---------------------------------------------------------------------------

export const PartialXsoarPacksConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    server: ServerSettingsSchema.partial().optional(),
    custom_pack_authors: z.array(z.string().min(1)).optional(),
    artifacts: z
      .object({
        backend: ArtifactBackendSchema.optional(),
        strict_existence_checks: z.boolean().optional(),
        s3: S3SettingsSchema.partial().optional(),
        azure: AzureSettingsSchema.partial().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

export type PartialXsoarPacksConfig = z.infer<typeof PartialXsoarPacksConfigSchema>
