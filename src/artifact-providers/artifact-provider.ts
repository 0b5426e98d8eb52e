/**
 * ArtifactProvider interface definition
 *
 * The capability contract every artifact-store backend implements. The
 * platform client only ever holds a reference to this interface, so adding
 * a backend needs no change outside this directory.
 *
 * All backends address artifacts with the same key layout:
 *
 *   content/packs/{packId}/{packVersion}/{packId}.zip
 *
 * and list versions as the immediate child "directories" under
 * `content/packs/{packId}/`.
 */

export const PACKS_ROOT = 'content/packs'

/** Identifier of a supported storage backend */
export type ArtifactBackend = 's3' | 'azure'

export interface ArtifactProvider {
  /**
   * Backend identifier.
   * @example "s3"
   */
  readonly backend: ArtifactBackend

  /**
   * Human-readable location (bucket or container URL) for logs and CLI output.
   */
  readonly location: string

  /**
   * Perform a minimal round trip against the configured location.
   * @throws {ConnectionFailureError} with a reason telling credential,
   *   reachability and timeout problems apart
   */
  testConnection(): Promise<boolean>

  /**
   * Whether the artifact for this pack version exists. Not-found resolves to
   * `false`; so does any other lookup failure unless the provider was built
   * with `strictExistenceChecks`.
   */
  isAvailable(packId: string, packVersion: string): Promise<boolean>

  /**
   * Fetch the whole artifact into memory.
   * @throws {NotFoundError} when the artifact does not exist
   * @throws {TransportError} on any other I/O failure
   */
  download(packId: string, packVersion: string): Promise<Buffer>

  /**
   * Highest stored version of a pack under version ordering.
   * @throws {NoVersionsFoundError} when nothing is stored for the pack
   */
  getLatestVersion(packId: string): Promise<string>
}

/** Canonical storage key of a pack artifact. */
export function packKey(packId: string, packVersion: string): string {
  return `${PACKS_ROOT}/${packId}/${packVersion}/${packId}.zip`
}

/** Listing prefix under which all versions of a pack live. */
export function packPrefix(packId: string): string {
  return `${PACKS_ROOT}/${packId}/`
}

/**
 * Extract the version segment from a listed child prefix such as
 * `content/packs/MyPack/1.2.0/`. Returns undefined for anything that is not
 * exactly one level below the pack prefix.
 */
export function versionFromPrefix(prefix: string): string | undefined {
  const segments = prefix.split('/')
  const version = segments[3]
  if (version === undefined || version === '') return undefined
  return version
}
