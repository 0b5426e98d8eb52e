/**
 * HttpTransport: the single HTTP seam used by the platform client.
 *
 * NodeHttpTransport uses Node.js built-in `http`/`https` modules and applies
 * one TLS policy and one timeout to every request it sends.
 */

import http from 'http'
import https from 'https'
import { TransportError } from '../../core/errors.js'
import { tlsAgentOptions, type TlsPolicy } from '../../utils/tls.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE'

export interface HttpRequest {
  url: string
  method: HttpMethod
  headers?: Record<string, string>
  body?: Buffer | string
  /** Redirect hops to follow; 0 returns the 3xx response as is */
  maxRedirects?: number
}

export interface HttpResponse {
  status: number
  headers: Record<string, string | string[] | undefined>
  body: Buffer
}

export interface HttpTransport {
  /**
   * Send one request and buffer the whole response body.
   * Resolves for every HTTP status; rejects only when no response arrives.
   * @throws {TransportError} with the socket error as `cause`
   */
  request(request: HttpRequest): Promise<HttpResponse>
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

// ---------------------------------------------------------------------------
// NodeHttpTransport
// ---------------------------------------------------------------------------

export interface NodeHttpTransportOptions {
  verifySsl?: TlsPolicy
  timeoutMs?: number
}

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308
}

export class NodeHttpTransport implements HttpTransport {
  private readonly verifySsl: TlsPolicy
  readonly timeoutMs: number
  private _agent: https.Agent | undefined

  constructor(options: NodeHttpTransportOptions = {}) {
    this.verifySsl = options.verifySsl ?? true
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS
  }

  private get agent(): https.Agent {
    if (this._agent === undefined) {
      this._agent = new https.Agent(tlsAgentOptions(this.verifySsl))
    }
    return this._agent
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.send(request)
    const location = response.headers.location
    const hopsLeft = request.maxRedirects ?? 0
    if (isRedirect(response.status) && typeof location === 'string' && hopsLeft > 0) {
      const next = new URL(location, request.url).toString()
      const method = response.status === 303 ? 'GET' : request.method
      return this.request({
        ...request,
        url: next,
        method,
        ...(method === 'GET' && { body: undefined }),
        maxRedirects: hopsLeft - 1,
      })
    }
    return response
  }

  private send(request: HttpRequest): Promise<HttpResponse> {
    return new Promise<HttpResponse>((resolve, reject) => {
      let url: URL
      try {
        url = new URL(request.url)
      } catch (err) {
        reject(new TransportError(`Invalid URL: ${request.url}`, { url: request.url }, err))
        return
      }

      const isHttps = url.protocol === 'https:'
      const options: https.RequestOptions = {
        method: request.method,
        headers: request.headers,
        timeout: this.timeoutMs,
        ...(isHttps && { agent: this.agent }),
      }

      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = []
        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk)
        })
        res.on('end', () => {
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks) })
        })
        res.on('error', (err) => {
          reject(this.failure(request, err))
        })
      }

      const req = isHttps ? https.request(url, options, onResponse) : http.request(url, options, onResponse)

      // The socket timeout only signals; destroy with an error carrying ETIMEDOUT
      req.on('timeout', () => {
        req.destroy(
          Object.assign(new Error(`Request timed out after ${String(this.timeoutMs)}ms`), {
            code: 'ETIMEDOUT',
          })
        )
      })
      req.on('error', (err) => {
        reject(this.failure(request, err))
      })

      if (request.body !== undefined) req.write(request.body)
      req.end()
    })
  }

  private failure(request: HttpRequest, err: Error): TransportError {
    return new TransportError(
      `${request.method} ${request.url} failed: ${err.message}`,
      { method: request.method, url: request.url },
      err
    )
  }
}
