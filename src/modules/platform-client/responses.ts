/**
 * Status and body checks shared by platform and marketplace calls.
 */

import type { z } from 'zod'
import { NotFoundError, TransportError } from '../../core/errors.js'
import { isSuccessStatus, type HttpResponse } from './http-transport.js'

function bodyExcerpt(body: Buffer): string {
  const text = body.toString('utf-8').trim()
  return text.length > 200 ? `${text.slice(0, 200)}…` : text
}

/**
 * @throws {NotFoundError} on 404 when `notFoundIsDistinct` is set
 * @throws {TransportError} on any other non-2xx status
 */
export function ensureOk(
  response: HttpResponse,
  what: string,
  options: { notFoundIsDistinct?: boolean } = {}
): HttpResponse {
  if (isSuccessStatus(response.status)) return response
  const context = { status: response.status, what }
  if (response.status === 404 && options.notFoundIsDistinct === true) {
    throw new NotFoundError(`${what}: not found (HTTP 404)`, context)
  }
  const excerpt = bodyExcerpt(response.body)
  throw new TransportError(
    `${what} failed with HTTP ${String(response.status)}${excerpt ? `: ${excerpt}` : ''}`,
    context
  )
}

/**
 * Decode a JSON body and validate it.
 * @throws {TransportError} when the body is not JSON or does not match
 */
export function parseJsonBody<T extends z.ZodTypeAny>(
  response: HttpResponse,
  schema: T,
  what: string
): z.output<T> {
  let decoded: unknown
  try {
    decoded = JSON.parse(response.body.toString('utf-8'))
  } catch (err) {
    throw new TransportError(`${what} returned a body that is not JSON`, { what }, err)
  }
  const result = schema.safeParse(decoded)
  if (!result.success) {
    throw new TransportError(`${what} returned an unexpected payload`, {
      what,
      issues: result.error.issues,
    })
  }
  return result.data
}
