import { STATUS_CODES } from 'node:http'

import fp from 'fastify-plugin'
import type { FastifyError, FastifyInstance } from 'fastify'

import type { AgentRegistry } from '../core/agents.js'
import type { BuildInfo } from '../core/buildinfo.js'
import {
  listAgentsHandler,
  livezHandler,
  readyzHandler,
  versionHandler,
  type RouteHandler,
} from './handlers.js'
import {
  ProblemType,
  writeError,
  writeInternalError,
  writeMethodNotAllowed,
  writeNotFound,
} from './response.js'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export interface Route {
  method: HttpMethod
  url: string
  handler: RouteHandler
}

export interface RouteDeps {
  agents: AgentRegistry
  buildInfo: BuildInfo
}

export function buildRoutes(deps: RouteDeps): Route[] {
  return [
    // Health
    { method: 'GET', url: '/livez', handler: livezHandler },
    { method: 'GET', url: '/readyz', handler: readyzHandler },
    { method: 'GET', url: '/version', handler: versionHandler(deps.buildInfo) },

    // Agents
    { method: 'GET', url: '/api/v1/agents', handler: listAgentsHandler(deps.agents) },
  ]
}

function pathOf(url: string): string {
  const query = url.indexOf('?')
  return query === -1 ? url : url.slice(0, query)
}

/**
 * Methods registered for an exact path. GET routes also answer HEAD.
 */
export function allowedMethods(routes: readonly Route[], path: string): string[] {
  const methods = new Set<string>()
  for (const route of routes) {
    if (route.url !== path) continue
    methods.add(route.method)
    if (route.method === 'GET') methods.add('HEAD')
  }
  return [...methods]
}

export interface RouterOptions {
  routes: readonly Route[]
}

export const routerPlugin = fp(
  async (fastify: FastifyInstance, opts: RouterOptions) => {
    fastify.setNotFoundHandler(async (request, reply) => {
      const path = pathOf(request.url)
      const allowed = allowedMethods(opts.routes, path)
      if (allowed.length > 0) {
        return writeMethodNotAllowed(
          reply,
          request.log,
          allowed,
          `method ${request.method} is not allowed on ${path}`,
          request.url,
        )
      }
      return writeNotFound(reply, request.log, `no route for ${request.method} ${path}`, request.url)
    })

    fastify.setErrorHandler(async (error: FastifyError, request, reply) => {
      const status = error.statusCode ?? 500
      if (status < 400 || status >= 500) {
        request.log.error({ err: error }, 'request failed')
        return writeInternalError(reply, request.log, undefined, request.url)
      }
      return writeError(
        reply,
        request.log,
        status,
        status === 404 ? ProblemType.NotFound : ProblemType.BadRequest,
        STATUS_CODES[status] ?? 'Bad Request',
        error.message,
        request.url,
      )
    })

    for (const route of opts.routes) {
      fastify.route({ method: route.method, url: route.url, handler: route.handler })
    }
  },
  {
    name: 'agnx-router',
  },
)
