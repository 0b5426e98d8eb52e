/**
 * TLS verification policy shared by the platform transport and the S3 backend.
 *
 * `true` verifies against the system trust store, `false` disables
 * verification, and a string is read as the path of a CA bundle to trust.
 */

import { readFileSync } from 'fs'
import type { AgentOptions } from 'https'

export type TlsPolicy = boolean | string

export function tlsAgentOptions(policy: TlsPolicy): AgentOptions {
  if (typeof policy === 'string') {
    return { rejectUnauthorized: true, ca: readFileSync(policy) }
  }
  return { rejectUnauthorized: policy }
}
