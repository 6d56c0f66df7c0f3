/**
 * Base class for every error raised by agnx itself.
 */
export class AgnxError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = this.constructor.name
  }
}

/** Config file is missing or unreadable. */
export class ConfigReadError extends AgnxError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(`read config file ${path}: ${describeCause(cause)}`, { cause })
    this.path = path
  }
}

/** Config file is not valid YAML, or has values of the wrong shape. */
export class ConfigParseError extends AgnxError {
  readonly path: string

  constructor(path: string, message: string, cause?: unknown) {
    super(`parse config file ${path}: ${message}`, cause === undefined ? undefined : { cause })
    this.path = path
  }
}

export class ServerStartError extends AgnxError {
  constructor(cause: unknown) {
    super(`server error: ${describeCause(cause)}`, { cause })
  }
}

export class ShutdownTimeoutError extends AgnxError {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`shutdown: graceful shutdown did not complete within ${String(timeoutMs)}ms`)
    this.timeoutMs = timeoutMs
  }
}

export class EncodeError extends AgnxError {
  constructor(cause: unknown) {
    super(`encode response: ${describeCause(cause)}`, { cause })
  }
}

/** Thrown by Server.run() when the instance has already been started. */
export class ServerStateError extends AgnxError {}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
