/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Ensures that API tokens, tenant auth ids and SAS tokens never appear in
 * logs, command output or error messages.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify credential values embedded in strings.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // Azure SAS query signature: sig=...
  /sig=[A-Za-z0-9%+/=]+/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
  // Generic long base64-looking tokens (>=32 chars, no spaces)
  /[A-Za-z0-9+/]{32,}={0,2}/g,
]

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'api_token',
  'apiToken',
  'access_token',
  'accessToken',
  '*.api_token',
  '*.access_token',
  'headers.Authorization',
  'headers["x-xdr-auth-id"]',
  'env.DEMISTO_API_KEY',
  'env.AZURE_STORAGE_SAS_TOKEN',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known secret patterns in a string with `***`.
 *
 * Best-effort only; unknown token formats pass through.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set([
  'api_token',
  'apiToken',
  'access_token',
  'accessToken',
  'auth_id',
  'token',
  'secret',
  'password',
])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 * Empty credential values stay empty so that "not configured" remains visible.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      if (CREDENTIAL_FIELDS.has(k) && v !== '' && v !== undefined) {
        masked[k] = MASKED_VALUE
      } else {
        masked[k] = deepMask(v)
      }
    }
    return masked
  }
  return value
}
