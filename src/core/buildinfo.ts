import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

export interface BuildInfo {
  version: string
  commit: string
  date: string
  runtime: string
}

const PACKAGE_JSON = fileURLToPath(new URL('../../package.json', import.meta.url))

function packageVersion(): string | undefined {
  try {
    const pkg = JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8')) as { version?: unknown }
    return typeof pkg.version === 'string' && pkg.version !== '' ? pkg.version : undefined
  } catch {
    return undefined
  }
}

// Release builds inject AGNX_VERSION / AGNX_COMMIT / AGNX_BUILD_DATE.
export function resolveBuildInfo(env: NodeJS.ProcessEnv = process.env): BuildInfo {
  return {
    version: env.AGNX_VERSION || packageVersion() || 'dev',
    commit: env.AGNX_COMMIT || 'none',
    date: env.AGNX_BUILD_DATE || 'unknown',
    runtime: process.version,
  }
}

export const buildInfo: BuildInfo = resolveBuildInfo()

export function formatVersion(info: BuildInfo = buildInfo): string {
  return `agnx ${info.version} (commit ${info.commit}) built ${info.date} (node ${info.runtime})`
}
