import type { Server as HttpServer } from 'node:http'

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify'
import { v4 as uuidv4 } from 'uuid'

import { EmptyAgentRegistry, type AgentRegistry } from '../core/agents.js'
import { buildInfo as defaultBuildInfo, type BuildInfo } from '../core/buildinfo.js'
import type { Config } from '../core/config.js'
import {
  ServerStartError,
  ServerStateError,
  ShutdownTimeoutError,
  describeCause,
} from '../core/errors.js'
import { buildRoutes, routerPlugin } from './router.js'

export const SHUTDOWN_TIMEOUT_MS = 10_000
export const IDLE_SWEEP_MS = 100

export interface AppOptions {
  config: Readonly<Config>
  logger: FastifyBaseLogger
  agents?: AgentRegistry
  buildInfo?: BuildInfo
}

/**
 * Builds a fully routed Fastify instance without binding a socket.
 */
export function createApp(options: AppOptions): FastifyInstance {
  const { config } = options
  const app = Fastify({
    loggerInstance: options.logger,
    genReqId: () => uuidv4(),
    requestTimeout: config.server.readTimeout * 1000,
    connectionTimeout: config.server.writeTimeout * 1000,
  })

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id)
  })

  app.register(routerPlugin, {
    routes: buildRoutes({
      agents: options.agents ?? new EmptyAgentRegistry(),
      buildInfo: options.buildInfo ?? defaultBuildInfo,
    }),
  })

  return app
}

export type ServerState = 'idle' | 'running' | 'shutting-down' | 'stopped' | 'failed'

export interface ServerOptions extends AppOptions {
  shutdownTimeoutMs?: number
  /** Called once the listener is bound, with its address (e.g. http://127.0.0.1:8080). */
  onListen?: (address: string, listener: HttpServer) => void
}

// Resolves with the listener error, or undefined once the signal aborts.
function waitForTermination(server: HttpServer, signal: AbortSignal): Promise<Error | undefined> {
  return new Promise((resolve) => {
    const onError = (err: Error) => {
      cleanup()
      resolve(err)
    }
    const onAbort = () => {
      cleanup()
      resolve(undefined)
    }
    const cleanup = () => {
      server.off('error', onError)
      signal.removeEventListener('abort', onAbort)
    }

    if (signal.aborted) {
      resolve(undefined)
      return
    }
    server.once('error', onError)
    signal.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Owns one HTTP listener for a single run: idle -> running -> shutting-down ->
 * stopped, or failed. A stopped or failed instance cannot be restarted.
 */
export class Server {
  private currentState: ServerState = 'idle'
  private readonly options: ServerOptions
  private readonly shutdownTimeoutMs: number

  constructor(options: ServerOptions) {
    this.options = options
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS
  }

  get state(): ServerState {
    return this.currentState
  }

  private get logger(): FastifyBaseLogger {
    return this.options.logger
  }

  /**
   * Serves until the listener fails or `signal` aborts, then shuts down
   * gracefully within the grace window.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new ServerStateError(`server cannot be started from state ${this.currentState}`)
    }
    this.currentState = 'running'

    const { host, port } = this.options.config.server
    const app = createApp(this.options)
    // Responses finished after shutdown starts must not keep their socket alive.
    app.addHook('onSend', async (_request, reply, payload) => {
      if (this.currentState === 'shutting-down') {
        reply.header('connection', 'close')
      }
      return payload
    })

    let address: string
    try {
      this.logger.info({ port }, 'starting server')
      address = await app.listen({ host, port })
    } catch (err: unknown) {
      this.currentState = 'failed'
      throw new ServerStartError(err)
    }
    this.options.onListen?.(address, app.server)

    const listenerError = await waitForTermination(app.server, signal)
    if (listenerError !== undefined) {
      this.currentState = 'failed'
      await this.release(app)
      throw new ServerStartError(listenerError)
    }

    this.currentState = 'shutting-down'
    this.logger.info('shutting down server')
    try {
      await this.shutdown(app)
    } catch (err: unknown) {
      this.currentState = 'failed'
      throw err
    }
    this.currentState = 'stopped'
    this.logger.info('server stopped')
  }

  /**
   * close() only drops connections idle at the moment it is called, so
   * connections that finish their last request afterwards are swept on an
   * interval until the listener is fully closed.
   */
  private async shutdown(app: FastifyInstance): Promise<void> {
    let timer: NodeJS.Timeout | undefined
    const sweep = setInterval(() => {
      app.server.closeIdleConnections()
    }, IDLE_SWEEP_MS)
    const closing = (async () => {
      await app.close()
      return 'closed' as const
    })()
    const expired = new Promise<'expired'>((resolve) => {
      timer = setTimeout(() => resolve('expired'), this.shutdownTimeoutMs)
    })

    try {
      const outcome = await Promise.race([closing, expired])
      if (outcome === 'expired') {
        this.logger.warn(
          { timeoutMs: this.shutdownTimeoutMs },
          'graceful shutdown timed out, closing remaining connections',
        )
        app.server.closeAllConnections()
        throw new ShutdownTimeoutError(this.shutdownTimeoutMs)
      }
    } finally {
      clearTimeout(timer)
      clearInterval(sweep)
    }
  }

  // Best-effort close after a listener failure; the listener error is what gets reported.
  private async release(app: FastifyInstance): Promise<void> {
    try {
      await app.close()
    } catch (err: unknown) {
      this.logger.error({ err }, `close after listener failure: ${describeCause(err)}`)
    }
  }
}
