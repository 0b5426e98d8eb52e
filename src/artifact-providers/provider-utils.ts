/**
 * Error classification and shared operations for artifact-provider backends.
 *
 * The storage SDKs report failures with differently shaped errors; these
 * helpers read the common fields (`name`, `code`, HTTP status) so each
 * backend maps them onto the same error taxonomy.
 */

import type pino from 'pino'
import {
  ConnectionFailureError,
  NoVersionsFoundError,
  NotFoundError,
  TransportError,
  type ConnectionFailureReason,
} from '../core/errors.js'
import { maxByVersion } from '../modules/version-ordering/version-ordering.js'
import { versionFromPrefix } from './artifact-provider.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function stringField(err: unknown, key: string): string | undefined {
  if (!isRecord(err)) return undefined
  const value = err[key]
  return typeof value === 'string' ? value : undefined
}

/** HTTP status carried by an SDK error (AWS `$metadata`, Azure `statusCode`). */
export function errorStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined
  if (typeof err.statusCode === 'number') return err.statusCode
  const metadata = err.$metadata
  if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
    return metadata.httpStatusCode
  }
  return undefined
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

const NOT_FOUND_NAMES = new Set([
  'NotFound',
  'NoSuchKey',
  'NoSuchBucket',
  'BlobNotFound',
  'ContainerNotFound',
  'ResourceNotFound',
])

export function isNotFoundError(err: unknown): boolean {
  if (errorStatus(err) === 404) return true
  const name = stringField(err, 'name')
  const code = stringField(err, 'code') ?? stringField(err, 'Code')
  return (name !== undefined && NOT_FOUND_NAMES.has(name)) ||
    (code !== undefined && NOT_FOUND_NAMES.has(code))
}

const MISSING_CREDENTIAL_CODES = new Set([
  'CredentialsProviderError',
  'NoAuthenticationInformation',
])

const INCOMPLETE_CREDENTIAL_CODES = new Set([
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'IncompleteSignature',
  'AuthorizationHeaderMalformed',
  'InvalidToken',
  'ExpiredToken',
  'AuthenticationFailed',
  'AuthorizationFailure',
])

const UNREACHABLE_CODES = new Set([
  'ENOTFOUND',
  'ECONNREFUSED',
  'ECONNRESET',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'REQUEST_SEND_ERROR',
])

const TIMEOUT_CODES = new Set(['TimeoutError', 'ETIMEDOUT', 'ESOCKETTIMEDOUT', 'RequestTimeout'])

/**
 * Map an SDK or socket error onto a connection failure reason.
 */
export function classifyConnectionError(err: unknown): ConnectionFailureReason {
  const candidates = [
    stringField(err, 'name'),
    stringField(err, 'code'),
    stringField(err, 'Code'),
  ].filter((value): value is string => value !== undefined)

  if (candidates.some((c) => MISSING_CREDENTIAL_CODES.has(c))) return 'missing_credentials'
  if (candidates.some((c) => INCOMPLETE_CREDENTIAL_CODES.has(c))) return 'incomplete_credentials'
  if (candidates.some((c) => TIMEOUT_CODES.has(c))) return 'timeout'
  if (candidates.some((c) => UNREACHABLE_CODES.has(c))) return 'endpoint_unreachable'

  const status = errorStatus(err)
  if (status === 401 || status === 403) return 'incomplete_credentials'
  return 'request_failed'
}

const REASON_MESSAGES: Record<ConnectionFailureReason, string> = {
  missing_credentials: 'credentials not found',
  incomplete_credentials: 'incomplete or rejected credentials',
  endpoint_unreachable: 'could not connect to the endpoint',
  timeout: 'connection timed out',
  request_failed: 'request failed',
}

export function toConnectionFailure(
  err: unknown,
  backend: string,
  location: string
): ConnectionFailureError {
  const reason = classifyConnectionError(err)
  return new ConnectionFailureError(
    `${backend} connection to ${location} failed: ${REASON_MESSAGES[reason]} (${errorMessage(err)})`,
    reason,
    { backend, location },
    err
  )
}

export interface ExistenceCheckOptions {
  strict: boolean
  logger: pino.Logger
  key: string
}

/**
 * Run an existence check. Not-found is `false`. Any other failure is also
 * `false` unless `strict` is set, in which case it surfaces as a
 * TransportError; a transient network error is otherwise indistinguishable
 * from absence.
 */
export async function checkExists(
  check: () => Promise<void>,
  options: ExistenceCheckOptions
): Promise<boolean> {
  try {
    await check()
    return true
  } catch (err) {
    if (isNotFoundError(err)) return false
    if (options.strict) {
      throw new TransportError(
        `Existence check failed for ${options.key}: ${errorMessage(err)}`,
        { key: options.key },
        err
      )
    }
    options.logger.debug({ key: options.key, err }, 'Existence check failed; treating as absent')
    return false
  }
}

/**
 * Fetch bytes, mapping not-found to NotFoundError and everything else to
 * TransportError.
 */
export async function fetchArtifact(
  fetch: () => Promise<Buffer>,
  key: string
): Promise<Buffer> {
  try {
    return await fetch()
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new NotFoundError(`Artifact not found: ${key}`, { key }, err)
    }
    if (err instanceof TransportError) throw err
    throw new TransportError(`Failed to download ${key}: ${errorMessage(err)}`, { key }, err)
  }
}

/**
 * Pick the latest version from a list of child prefixes.
 * @throws {NoVersionsFoundError} when no prefix carries a version segment
 */
export function latestFromPrefixes(packId: string, prefixes: readonly string[]): string {
  const versions = prefixes
    .map(versionFromPrefix)
    .filter((version): version is string => version !== undefined)
  if (versions.length === 0) {
    throw new NoVersionsFoundError(packId)
  }
  return maxByVersion(versions)
}

/** List child prefixes, wrapping storage failures as TransportError. */
export async function listPrefixes(
  list: () => Promise<string[]>,
  prefix: string
): Promise<string[]> {
  try {
    return await list()
  } catch (err) {
    throw new TransportError(`Failed to list ${prefix}: ${errorMessage(err)}`, { prefix }, err)
  }
}
