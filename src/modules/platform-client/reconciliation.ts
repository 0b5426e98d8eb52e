/**
 * Outdated-pack reconciliation.
 *
 * Custom packs (authored by one of the configured custom authors) are
 * compared against the latest version in the artifact store. Upstream packs
 * rely on the platform's own `updateAvailable` flag and changelog.
 */

import type pino from 'pino'
import { ConfigurationError, NoVersionsFoundError } from '../../core/errors.js'
import type { ArtifactProvider } from '../../artifact-providers/artifact-provider.js'
import { maxByVersion } from '../version-ordering/version-ordering.js'
import { UPSTREAM_AUTHOR, type InstalledPack, type OutdatedPack } from './types.js'

export interface ReconciliationContext {
  customPackAuthors: ReadonlySet<string>
  artifactProvider: ArtifactProvider | undefined
  logger: pino.Logger
}

export async function findOutdatedPacks(
  records: readonly InstalledPack[],
  context: ReconciliationContext
): Promise<OutdatedPack[]> {
  const outdated: OutdatedPack[] = []

  for (const pack of records) {
    if (context.customPackAuthors.has(pack.author)) {
      const provider = context.artifactProvider
      if (provider === undefined) {
        throw new ConfigurationError(
          `Pack ${pack.id} is authored by ${pack.author} but no artifact provider is configured`,
          { packId: pack.id, author: pack.author }
        )
      }

      let latest: string
      try {
        latest = await provider.getLatestVersion(pack.id)
      } catch (err) {
        if (err instanceof NoVersionsFoundError) {
          context.logger.warn(
            { packId: pack.id, location: provider.location },
            'Custom pack has no versions in the artifact store; skipping'
          )
          continue
        }
        throw err
      }

      if (latest === pack.currentVersion) continue
      outdated.push({
        id: pack.id,
        currentVersion: pack.currentVersion,
        latest,
        author: pack.author,
        custom: true,
      })
      continue
    }

    if (!pack.updateAvailable) continue
    outdated.push({
      id: pack.id,
      currentVersion: pack.currentVersion,
      latest: maxByVersion(pack.changelog),
      author: UPSTREAM_AUTHOR,
      custom: false,
    })
  }

  return outdated
}
