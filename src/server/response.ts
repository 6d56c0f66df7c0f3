import type { FastifyReply } from 'fastify'

import { EncodeError } from '../core/errors.js'
import type { ErrorLogger } from '../core/logger.js'

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8'
export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8'

/**
 * RFC 7807 Problem Details body.
 * See: https://datatracker.ietf.org/doc/html/rfc7807
 */
export interface ProblemDetail {
  type: string
  title: string
  status: number
  detail?: string
  instance?: string
}

export const ProblemType = {
  NotFound: 'https://agnx.dev/problems/not-found',
  BadRequest: 'https://agnx.dev/problems/bad-request',
  InternalError: 'https://agnx.dev/problems/internal-error',
  MethodNotAllowed: 'https://agnx.dev/problems/method-not-allowed',
} as const

export function encodeJSON(payload: unknown): string {
  let body: string | undefined
  try {
    body = JSON.stringify(payload)
  } catch (err: unknown) {
    throw new EncodeError(err)
  }
  if (body === undefined) {
    throw new EncodeError(new TypeError(`cannot encode value of type ${typeof payload}`))
  }
  return body
}

export function problem(
  status: number,
  type: string,
  title: string,
  detail?: string,
  instance?: string,
): ProblemDetail {
  const result: ProblemDetail = { type, title, status }
  if (detail) result.detail = detail
  if (instance) result.instance = instance
  return result
}

/**
 * Writes a JSON response. The payload is encoded before the status line is
 * committed; if encoding fails the error is logged and the client receives a
 * 500 problem instead of the requested status.
 */
export function writeJSON(
  reply: FastifyReply,
  logger: ErrorLogger,
  status: number,
  payload: unknown,
): FastifyReply {
  let body: string
  try {
    body = encodeJSON(payload)
  } catch (err: unknown) {
    logger.error({ err }, 'encode response')
    const fallback = problem(
      500,
      ProblemType.InternalError,
      'Internal Server Error',
      'failed to encode response',
    )
    return reply.code(500).header('content-type', JSON_CONTENT_TYPE).send(JSON.stringify(fallback))
  }

  return reply.code(status).header('content-type', JSON_CONTENT_TYPE).send(body)
}

export function writeText(reply: FastifyReply, status: number, body: string): FastifyReply {
  return reply.code(status).header('content-type', TEXT_CONTENT_TYPE).send(body)
}

/** Writes a Problem Detail whose status matches the status line. */
export function writeError(
  reply: FastifyReply,
  logger: ErrorLogger,
  status: number,
  problemType: string,
  title: string,
  detail?: string,
  instance?: string,
): FastifyReply {
  return writeJSON(reply, logger, status, problem(status, problemType, title, detail, instance))
}

export function writeNotFound(
  reply: FastifyReply,
  logger: ErrorLogger,
  detail?: string,
  instance?: string,
): FastifyReply {
  return writeError(reply, logger, 404, ProblemType.NotFound, 'Not Found', detail, instance)
}

export function writeBadRequest(
  reply: FastifyReply,
  logger: ErrorLogger,
  detail?: string,
  instance?: string,
): FastifyReply {
  return writeError(reply, logger, 400, ProblemType.BadRequest, 'Bad Request', detail, instance)
}

export function writeInternalError(
  reply: FastifyReply,
  logger: ErrorLogger,
  detail?: string,
  instance?: string,
): FastifyReply {
  return writeError(
    reply,
    logger,
    500,
    ProblemType.InternalError,
    'Internal Server Error',
    detail,
    instance,
  )
}

export function writeMethodNotAllowed(
  reply: FastifyReply,
  logger: ErrorLogger,
  allowed: readonly string[],
  detail?: string,
  instance?: string,
): FastifyReply {
  reply.header('allow', allowed.join(', '))
  return writeError(
    reply,
    logger,
    405,
    ProblemType.MethodNotAllowed,
    'Method Not Allowed',
    detail,
    instance,
  )
}
