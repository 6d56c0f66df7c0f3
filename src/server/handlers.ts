import type { FastifyReply, FastifyRequest } from 'fastify'

import type { AgentRegistry, AgentSummary } from '../core/agents.js'
import type { BuildInfo } from '../core/buildinfo.js'
import { writeJSON, writeText } from './response.js'

export type RouteHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>

export interface VersionResponse {
  version: string
  node: string
}

export interface ListAgentsResponse {
  agents: AgentSummary[]
}

// Process-is-alive only; no dependency checks.
export async function livezHandler(_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  return writeText(reply, 200, 'ok')
}

// TODO: check agents_dir and data_dir reachability once the registry loads from disk.
export async function readyzHandler(_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  return writeText(reply, 200, 'ok')
}

export function versionHandler(info: BuildInfo): RouteHandler {
  return async (request, reply) => {
    const body: VersionResponse = { version: info.version, node: info.runtime }
    return writeJSON(reply, request.log, 200, body)
  }
}

export function listAgentsHandler(registry: AgentRegistry): RouteHandler {
  return async (request, reply) => {
    const body: ListAgentsResponse = { agents: await registry.list() }
    return writeJSON(reply, request.log, 200, body)
  }
}
