/**
 * Error definitions for xsoar-packs
 * Provides the structured error hierarchy for storage, platform and deploy operations
 */

/** Base error class for all xsoar-packs errors */
export class PackToolError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options: { cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'PackToolError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PackToolError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Missing credentials, missing provider, invalid backend selection */
export class ConfigurationError extends PackToolError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_ERROR', context)
    this.name = 'ConfigurationError'
  }
}

export type ConnectionFailureReason =
  | 'missing_credentials'
  | 'incomplete_credentials'
  | 'endpoint_unreachable'
  | 'timeout'
  | 'request_failed'

/** Error thrown when a connectivity round trip fails */
export class ConnectionFailureError extends PackToolError {
  public readonly reason: ConnectionFailureReason

  constructor(
    message: string,
    reason: ConnectionFailureReason,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, 'CONNECTION_FAILURE', { reason, ...context }, { cause })
    this.name = 'ConnectionFailureError'
    this.reason = reason
  }
}

/** Error thrown when a version string cannot be parsed */
export class MalformedVersionError extends PackToolError {
  constructor(version: string) {
    super(`Malformed version string: "${version}"`, 'MALFORMED_VERSION', { version })
    this.name = 'MalformedVersionError'
  }
}

/** Error thrown when a maximum is requested over no versions */
export class EmptyInputError extends PackToolError {
  constructor(message = 'Cannot pick the latest version of an empty list') {
    super(message, 'EMPTY_INPUT')
    this.name = 'EmptyInputError'
  }
}

/** Error thrown when an artifact does not exist at its key */
export class NotFoundError extends PackToolError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'NOT_FOUND', context, { cause })
    this.name = 'NotFoundError'
  }
}

/** Error thrown on I/O or HTTP failure talking to storage, marketplace or platform */
export class TransportError extends PackToolError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', context, { cause })
    this.name = 'TransportError'
  }
}

/** Error thrown when a pack has no stored versions in the artifact store */
export class NoVersionsFoundError extends PackToolError {
  constructor(packId: string) {
    super(`No versions found for pack: ${packId}`, 'NO_VERSIONS_FOUND', { packId })
    this.name = 'NoVersionsFoundError'
  }
}

/** Error thrown when the platform rejects an uploaded pack */
export class DeploymentFailureError extends PackToolError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'DEPLOYMENT_FAILURE', context, { cause })
    this.name = 'DeploymentFailureError'
  }
}

/** Error thrown for an item kind outside the supported set */
export class UnsupportedItemTypeError extends PackToolError {
  constructor(itemType: string, supported: readonly string[]) {
    super(
      `Unknown item type "${itemType}". Must be one of [${supported.map((s) => `"${s}"`).join(', ')}]`,
      'UNSUPPORTED_ITEM_TYPE',
      { itemType, supported }
    )
    this.name = 'UnsupportedItemTypeError'
  }
}
