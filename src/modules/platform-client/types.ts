/**
 * Record shapes returned by the platform and produced by reconciliation.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Installed pack records
// ---------------------------------------------------------------------------

/**
 * The platform reports a changelog either as a map keyed by version or as a
 * plain list of versions. Both normalize to the list of versions.
 */
export const ChangelogSchema = z
  .union([z.array(z.string()), z.record(z.unknown())])
  .nullish()
  .transform((changelog): string[] => {
    if (changelog === null || changelog === undefined) return []
    return Array.isArray(changelog) ? changelog : Object.keys(changelog)
  })

export const InstalledPackSchema = z
  .object({
    id: z.string().min(1),
    currentVersion: z.string(),
    author: z.string().nullish().transform((author) => author ?? ''),
    updateAvailable: z.boolean().nullish().transform((flag) => flag ?? false),
    changelog: ChangelogSchema,
  })
  .passthrough()

export type InstalledPack = z.infer<typeof InstalledPackSchema>

/** A `null` listing means nothing is installed. */
export const InstalledPackListSchema = z
  .array(InstalledPackSchema)
  .nullable()
  .transform((packs) => packs ?? [])

// ---------------------------------------------------------------------------
// Reconciliation output
// ---------------------------------------------------------------------------

/** Author reported for packs sourced from the upstream marketplace */
export const UPSTREAM_AUTHOR = 'Upstream'

export interface OutdatedPack {
  id: string
  currentVersion: string
  latest: string
  author: string
  /** Sourced from the artifact store rather than the marketplace */
  custom: boolean
}
