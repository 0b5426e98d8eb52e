/**
 * CLI output formatting utilities
 *
 * Human-readable tables for installed and outdated pack listings.
 */

import type { InstalledPack, OutdatedPack } from '../../modules/platform-client/types.js'

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by header name)
 * @param keys    - Object keys to read from each row (in column order)
 * @returns Formatted string ready for console output
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => Math.max(max, (row[key] ?? '').length), 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys
      .map((key, i) => {
        const val = row[key] ?? ''
        return val.padEnd(widths[i] ?? val.length)
      })
      .join(' | ')
      .trimEnd()
  )

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n')
}

export function formatInstalledPacksTable(packs: readonly InstalledPack[]): string {
  const rows = packs.map((pack) => ({
    id: pack.id,
    currentVersion: pack.currentVersion,
    author: pack.author || '-',
    updateAvailable: pack.updateAvailable ? 'yes' : 'no',
  }))
  return formatTable(
    ['Pack', 'Version', 'Author', 'Update'],
    rows,
    ['id', 'currentVersion', 'author', 'updateAvailable']
  )
}

export function formatOutdatedPacksTable(packs: readonly OutdatedPack[]): string {
  const rows = packs.map((pack) => ({
    id: pack.id,
    currentVersion: pack.currentVersion,
    latest: pack.latest,
    author: pack.author,
  }))
  return formatTable(
    ['Pack', 'Installed', 'Latest', 'Source'],
    rows,
    ['id', 'currentVersion', 'latest', 'author']
  )
}
