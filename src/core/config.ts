import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import { parse as parseYaml } from 'yaml'

import { ConfigParseError, ConfigReadError, describeCause } from './errors.js'

export interface ServerConfig {
  host: string
  port: number
  /** Seconds. */
  readTimeout: number
  /** Seconds. */
  writeTimeout: number
}

export interface Config {
  server: ServerConfig
  dataDir: string
  agentsDir: string
}

export const DEFAULT_HOST = '0.0.0.0'
export const DEFAULT_PORT = 8080
export const DEFAULT_READ_TIMEOUT = 30
export const DEFAULT_WRITE_TIMEOUT = 30
export const DEFAULT_DATA_DIR = './.agnx'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function emptyConfig(): Config {
  return {
    server: { host: '', port: 0, readTimeout: 0, writeTimeout: 0 },
    dataDir: '',
    agentsDir: '',
  }
}

/**
 * Fills every zero-valued field with its default. Order matters: agentsDir is
 * derived from the already-resolved dataDir.
 */
export function applyDefaults(config: Config): Config {
  const server: ServerConfig = {
    host: config.server.host || DEFAULT_HOST,
    port: config.server.port || DEFAULT_PORT,
    readTimeout: config.server.readTimeout || DEFAULT_READ_TIMEOUT,
    writeTimeout: config.server.writeTimeout || DEFAULT_WRITE_TIMEOUT,
  }
  const dataDir = config.dataDir || DEFAULT_DATA_DIR
  const agentsDir = config.agentsDir || join(dataDir, 'agents')

  return { server, dataDir, agentsDir }
}

export function defaultConfig(): Config {
  return applyDefaults(emptyConfig())
}

function readInteger(
  path: string,
  raw: Record<string, unknown>,
  key: string,
  field: string,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const value = raw[key]
  if (value === undefined || value === null) return 0
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
    throw new ConfigParseError(path, `${field} must be an integer between 0 and ${String(max)}`)
  }
  return value
}

function readString(path: string, raw: Record<string, unknown>, key: string, field: string): string {
  const value = raw[key]
  if (value === undefined || value === null) return ''
  if (typeof value !== 'string') {
    throw new ConfigParseError(path, `${field} must be a string`)
  }
  return value
}

/**
 * Maps a parsed YAML document onto the config shape. Unknown keys are ignored;
 * missing keys stay zero-valued for applyDefaults to fill.
 */
export function parseConfig(raw: unknown, path = '<inline>'): Config {
  const config = emptyConfig()
  if (raw === undefined || raw === null) return config
  if (!isRecord(raw)) {
    throw new ConfigParseError(path, 'document root must be a mapping')
  }

  const server = raw.server
  if (server !== undefined && server !== null) {
    if (!isRecord(server)) {
      throw new ConfigParseError(path, 'server must be a mapping')
    }
    config.server = {
      host: readString(path, server, 'host', 'server.host'),
      port: readInteger(path, server, 'port', 'server.port', 65535),
      readTimeout: readInteger(path, server, 'read_timeout', 'server.read_timeout'),
      writeTimeout: readInteger(path, server, 'write_timeout', 'server.write_timeout'),
    }
  }

  config.dataDir = readString(path, raw, 'data_dir', 'data_dir')
  config.agentsDir = readString(path, raw, 'agents_dir', 'agents_dir')

  return config
}

/**
 * Loads configuration from a YAML file. An empty path yields pure defaults
 * without touching the filesystem.
 */
export function loadConfig(path: string): Config {
  if (path === '') return defaultConfig()

  let source: string
  try {
    source = readFileSync(path, 'utf-8')
  } catch (err: unknown) {
    throw new ConfigReadError(path, err)
  }

  let document: unknown
  try {
    document = parseYaml(source)
  } catch (err: unknown) {
    throw new ConfigParseError(path, describeCause(err), err)
  }

  return applyDefaults(parseConfig(document, path))
}

export function freezeConfig(config: Config): Readonly<Config> {
  Object.freeze(config.server)
  return Object.freeze(config)
}
