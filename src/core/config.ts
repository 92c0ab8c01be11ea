import { cpus } from 'node:os'
import { delimiter } from 'node:path'

/**
 * Centralized environment configuration.
 * All env keys and defaults in one place.
 */

/** Env key constants. */
export const EnvKeys = {
  SCHEMABIND_PATH: 'SCHEMABIND_PATH',
  SCHEMABIND_WORKERS: 'SCHEMABIND_WORKERS',
  SCHEMABIND_DEBUG: 'SCHEMABIND_DEBUG',
} as const

type Env = Record<string, string | undefined>

function getEnvInt(env: Env, key: string, defaultValue: number): number {
  const v = env[key]
  if (v == null || v.trim() === '') return defaultValue
  const n = parseInt(v, 10)
  return Number.isNaN(n) ? defaultValue : n
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const v = env[key]?.toLowerCase()
  if (v == null || v === '') return defaultValue
  return v === 'true' || v === '1'
}

/** Glob-mode search roots, split on the platform path delimiter. Empty entries are dropped. */
export function getSearchRoots(env: Env = process.env): string[] {
  const raw = env[EnvKeys.SCHEMABIND_PATH] ?? ''
  return raw
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '')
}

/** Upper bound for concurrent emission and glob units. Defaults to the CPU count. */
export function getWorkerCount(env: Env = process.env): number {
  const workers = getEnvInt(env, EnvKeys.SCHEMABIND_WORKERS, cpus().length)
  return Math.max(1, workers)
}

export function isDebugEnabled(env: Env = process.env): boolean {
  return getEnvBool(env, EnvKeys.SCHEMABIND_DEBUG, false)
}
