/**
 * version-ordering module: barrel exports
 */

export {
  parseVersion,
  compareVersions,
  compareVersionKeys,
  maxByVersion,
  VersionOrder,
} from './version-ordering.js'
export type { VersionKey, VersionOrdering } from './version-ordering.js'
