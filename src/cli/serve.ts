import { Command, CommanderError, InvalidArgumentError, Option } from 'commander'

import { formatVersion } from '../core/buildinfo.js'
import { freezeConfig, loadConfig, type Config } from '../core/config.js'
import { describeCause } from '../core/errors.js'
import { createLogger, LOG_LEVELS, type LogLevel } from '../core/logger.js'
import { Server } from '../server/app.js'

export interface ServeOptions {
  config: string
  port?: number
  logLevel: LogLevel
}

export function parsePort(value: string): number {
  const port = Number(value)
  if (!/^\d+$/.test(value) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('port must be an integer between 1 and 65535')
  }
  return port
}

/**
 * Loads the config file and applies the --port override. The result is frozen.
 */
export function resolveConfig(opts: Pick<ServeOptions, 'config' | 'port'>): Readonly<Config> {
  const config = loadConfig(opts.config)
  if (opts.port !== undefined) {
    config.server.port = opts.port
  }
  return freezeConfig(config)
}

async function serve(opts: ServeOptions): Promise<void> {
  const config = resolveConfig(opts)
  const logger = createLogger(opts.logLevel)

  const controller = new AbortController()
  const onSignal = () => {
    controller.abort()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    await new Server({ config, logger }).run(controller.signal)
  } finally {
    process.removeListener('SIGINT', onSignal)
    process.removeListener('SIGTERM', onSignal)
  }
}

export function createProgram(): Command {
  return new Command()
    .name('agnx')
    .description('HTTP front-end for the agnx agent runtime')
    .version(formatVersion(), '-v, --version', 'print build metadata and exit')
    .option('-c, --config <path>', 'path to YAML config file (defaults only when omitted)', '')
    .option('-p, --port <port>', 'server port, overrides the config file', parsePort)
    .addOption(
      new Option('-l, --log-level <level>', 'log level').choices(LOG_LEVELS).default('info'),
    )
    .action(async (opts: ServeOptions) => {
      await serve(opts)
    })
}

const SINGLE_DASH_FLAGS = new Set(['-config', '-port', '-version', '-log-level'])

/**
 * Rewrites single-dash long flags (`-config x.yaml`, `-port=9000`) to their
 * `--` forms; commander would otherwise read `-config` as `-c onfig`.
 */
export function normalizeArgs(argv: readonly string[]): string[] {
  const args: string[] = []
  for (const [index, arg] of argv.entries()) {
    if (arg === '--') {
      args.push(...argv.slice(index))
      break
    }
    const flag = arg.split('=', 1)[0]
    args.push(SINGLE_DASH_FLAGS.has(flag) ? `-${arg}` : arg)
  }
  return args
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function main(argv: readonly string[]): Promise<number> {
  const program = createProgram().exitOverride()
  try {
    await program.parseAsync(normalizeArgs(argv), { from: 'user' })
    return 0
  } catch (err: unknown) {
    // Commander has already printed its own message (or the version).
    if (err instanceof CommanderError) return err.exitCode
    console.error(`error: ${describeCause(err)}`)
    return 1
  }
}
