/**
 * Validation of the platform connection settings before any network use.
 */

import { ConfigurationError } from '../../core/errors.js'
import type { ServerSettings } from './config-schema.js'

export interface ServerCredentials {
  serverUrl: string
  apiToken: string
  authId: string
}

/**
 * @throws {ConfigurationError} unless both the server URL and API token are set
 */
export function requireServerCredentials(server: ServerSettings): ServerCredentials {
  const serverUrl = server.url.trim()
  const apiToken = server.api_token.trim()
  if (!serverUrl || !apiToken) {
    throw new ConfigurationError(
      'Both server.url and server.api_token are required. Set them in config.yaml or via DEMISTO_BASE_URL and DEMISTO_API_KEY.',
      { hasUrl: serverUrl !== '', hasToken: apiToken !== '' }
    )
  }
  return { serverUrl: serverUrl.replace(/\/+$/, ''), apiToken, authId: server.auth_id.trim() }
}
