/// <reference types="vitest/globals" />

import http from 'node:http'

import type { AgentRegistry, AgentSummary } from '../core/agents.js'
import type { Config } from '../core/config.js'
import { ServerStartError, ServerStateError, ShutdownTimeoutError } from '../core/errors.js'
import { createLogger } from '../core/logger.js'
import { Server, type ServerOptions } from '../server/app.js'

function testConfig(port = 0): Config {
  return {
    server: { host: '127.0.0.1', port, readTimeout: 30, writeTimeout: 30 },
    dataDir: './.agnx',
    agentsDir: './.agnx/agents',
  }
}

interface GetResponse {
  status: number
  body: string
  connection: string | undefined
}

// Without an agent, one connection per request, closed after the response.
function get(url: string, agent: http.Agent | false = false): Promise<GetResponse> {
  return new Promise((resolve, reject) => {
    const req = http.get(url, { agent }, (res) => {
      let data = ''
      res.on('data', (chunk: Buffer) => {
        data += chunk.toString()
      })
      res.on('end', () => {
        resolve({ status: res.statusCode ?? 0, body: data, connection: res.headers.connection })
      })
      res.on('error', reject)
    })
    req.on('error', reject)
  })
}

function startServer(options: Partial<ServerOptions> = {}) {
  const controller = new AbortController()
  let resolveAddress: (address: string) => void = () => undefined
  let resolveListener: (listener: http.Server) => void = () => undefined
  const listening = new Promise<string>((resolve) => {
    resolveAddress = resolve
  })
  const listener = new Promise<http.Server>((resolve) => {
    resolveListener = resolve
  })
  const onListen = (address: string, server: http.Server) => {
    resolveListener(server)
    resolveAddress(address)
  }
  const server = new Server({
    config: testConfig(),
    logger: createLogger('silent'),
    ...options,
    onListen,
  })
  const running = server.run(controller.signal)
  return { server, controller, listening, listener, running }
}

describe('Server lifecycle', () => {
  it('starts idle', () => {
    const server = new Server({ config: testConfig(), logger: createLogger('silent') })

    expect(server.state).toBe('idle')
  })

  it('serves requests until the signal aborts, then stops cleanly', async () => {
    const { server, controller, listening, running } = startServer()
    const address = await listening

    expect(server.state).toBe('running')
    await expect(get(`${address}/livez`)).resolves.toEqual({
      status: 200,
      body: 'ok',
      connection: 'close',
    })

    controller.abort()

    await expect(running).resolves.toBeUndefined()
    expect(server.state).toBe('stopped')
    await expect(get(`${address}/livez`)).rejects.toThrow()
  })

  it('shuts down cleanly when cancelled immediately', async () => {
    const { server, controller, listening, running } = startServer()
    controller.abort()

    const address = await listening
    await expect(running).resolves.toBeUndefined()
    expect(server.state).toBe('stopped')
    await expect(get(`${address}/readyz`)).rejects.toThrow()
  })

  it('shuts down cleanly when the signal was aborted before run', async () => {
    const controller = new AbortController()
    controller.abort()
    const server = new Server({ config: testConfig(), logger: createLogger('silent') })

    await expect(server.run(controller.signal)).resolves.toBeUndefined()
    expect(server.state).toBe('stopped')
  })

  it('cannot be run twice', async () => {
    const { server, controller, running } = startServer()
    controller.abort()
    await running

    await expect(server.run(new AbortController().signal)).rejects.toBeInstanceOf(
      ServerStateError,
    )
    expect(server.state).toBe('stopped')
  })

  it('fails with ServerStartError when the port is taken', async () => {
    const first = startServer()
    const address = await first.listening
    const port = Number(new URL(address).port)

    const second = new Server({ config: testConfig(port), logger: createLogger('silent') })
    await expect(second.run(new AbortController().signal)).rejects.toBeInstanceOf(
      ServerStartError,
    )
    expect(second.state).toBe('failed')

    first.controller.abort()
    await first.running
  })

  it('fails with ServerStartError when the listener errors after binding', async () => {
    const { server, listening, listener, running } = startServer()
    const address = await listening
    const httpServer = await listener

    httpServer.emit('error', new Error('accept EMFILE: too many open files'))

    await expect(running).rejects.toThrow('server error: accept EMFILE: too many open files')
    await expect(running).rejects.toBeInstanceOf(ServerStartError)
    expect(server.state).toBe('failed')
    await expect(get(`${address}/livez`)).rejects.toThrow()
  })

  describe('shutdown grace window', () => {
    let release: (agents: AgentSummary[]) => void = () => undefined

    afterEach(() => {
      release([])
    })

    it('reports ShutdownTimeoutError and drops connections still in flight', async () => {
      let entered: () => void = () => undefined
      const handlerEntered = new Promise<void>((resolve) => {
        entered = resolve
      })
      const agents: AgentRegistry = {
        list: () =>
          new Promise<AgentSummary[]>((resolve) => {
            release = resolve
            entered()
          }),
      }

      const { server, controller, listening, running } = startServer({
        agents,
        shutdownTimeoutMs: 200,
      })
      const address = await listening
      const inflight = get(`${address}/api/v1/agents`).then(
        (response) => response.status,
        (err: unknown) => err,
      )
      await handlerEntered

      controller.abort()

      await expect(running).rejects.toBeInstanceOf(ShutdownTimeoutError)
      expect(server.state).toBe('failed')
      expect(await inflight).toBeInstanceOf(Error)
    })

    it('lets in-flight requests finish inside the window', async () => {
      let entered: () => void = () => undefined
      const handlerEntered = new Promise<void>((resolve) => {
        entered = resolve
      })
      const agents: AgentRegistry = {
        list: () =>
          new Promise<AgentSummary[]>((resolve) => {
            release = resolve
            entered()
          }),
      }

      const { server, controller, listening, running } = startServer({
        agents,
        shutdownTimeoutMs: 5_000,
      })
      const address = await listening
      const inflight = get(`${address}/api/v1/agents`)
      await handlerEntered

      controller.abort()
      setTimeout(() => release([{ name: 'triage' }]), 50)

      await expect(inflight).resolves.toEqual({
        status: 200,
        body: '{"agents":[{"name":"triage"}]}',
        connection: 'close',
      })
      await expect(running).resolves.toBeUndefined()
      expect(server.state).toBe('stopped')
    })

    it('stops without waiting out the window for keep-alive clients', async () => {
      let entered: () => void = () => undefined
      const handlerEntered = new Promise<void>((resolve) => {
        entered = resolve
      })
      const agents: AgentRegistry = {
        list: () =>
          new Promise<AgentSummary[]>((resolve) => {
            release = resolve
            entered()
          }),
      }
      const keepAlive = new http.Agent({ keepAlive: true })

      const { server, controller, listening, running } = startServer({
        agents,
        shutdownTimeoutMs: 5_000,
      })
      const address = await listening
      await expect(get(`${address}/livez`, keepAlive)).resolves.toEqual({
        status: 200,
        body: 'ok',
        connection: 'keep-alive',
      })

      const inflight = get(`${address}/api/v1/agents`, keepAlive)
      await handlerEntered
      const abortedAt = Date.now()
      controller.abort()
      setTimeout(() => release([]), 50)

      await expect(inflight).resolves.toEqual({
        status: 200,
        body: '{"agents":[]}',
        connection: 'close',
      })
      await expect(running).resolves.toBeUndefined()
      expect(Date.now() - abortedAt).toBeLessThan(2_000)
      expect(server.state).toBe('stopped')

      keepAlive.destroy()
    })
  })
})
