import { readFile, writeFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { AppError } from '../shared/error.js'
import { configSchema, REFRESH_INTERVAL_VALUES, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.chain-doctor.yaml'

let cachedConfig: Config | null = null

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Config file paths (global + project)
 * Global is the base, project overrides it; CHAIN_DOCTOR_CONFIG replaces both
 */
export function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const explicit = process.env.CHAIN_DOCTOR_CONFIG
  if (explicit) {
    if (existsSync(explicit)) return { globalPath: null, projectPath: explicit }
    logger.warn(`${AppError.configNotFound(explicit).message}, using defaults`)
    return { globalPath: null, projectPath: null }
  }

  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // Same file when running from home
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/** File that `saveConfig` writes to */
export function resolveWritePath(cwd?: string): string {
  const explicit = process.env.CHAIN_DOCTOR_CONFIG
  if (explicit) return explicit
  const { projectPath } = findConfigPaths(cwd)
  return projectPath ?? join(homedir(), CONFIG_FILENAME)
}

/**
 * Parse YAML file, returning empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw AppError.configInvalid(`${filePath} must contain a mapping at the top level`)
  }
  return parsed
}

async function readLayer(filePath: string | null): Promise<Record<string, unknown>> {
  if (!filePath) return {}
  try {
    return await parseYamlFile(filePath)
  } catch (error) {
    logger.warn(`Ignoring unreadable config ${filePath}: ${getErrorMessage(error)}`)
    return {}
  }
}

/**
 * Merge config objects: project fields override global fields.
 * Nested objects merge, arrays are replaced.
 */
export function mergeConfigLayers(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? mergeConfigLayers(current, val) : val
  }
  return result
}

/**
 * Load settings
 * Order: defaults ← ~/.chain-doctor.yaml ← ./.chain-doctor.yaml ← env
 */
export async function loadConfig(options: { cwd?: string; fresh?: boolean } = {}): Promise<Config> {
  if (cachedConfig && !options.fresh) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)
  const merged = mergeConfigLayers(await readLayer(globalPath), await readLayer(projectPath))

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    logger.warn(`Config file format error, using defaults (${issues})`)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

/**
 * Apply environment variable overrides to config.
 * Invalid values are reported and skipped.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env
  let next = config

  const interval = env.CHAIN_DOCTOR_REFRESH_INTERVAL
  if (interval) {
    const match = REFRESH_INTERVAL_VALUES.find(value => value === interval)
    if (match) {
      next = { ...next, refresh_interval: match }
    } else {
      logger.warn(`Ignoring CHAIN_DOCTOR_REFRESH_INTERVAL=${interval} (expected ${REFRESH_INTERVAL_VALUES.join('/')})`)
    }
  }

  const timeout = env.CHAIN_DOCTOR_PROBE_TIMEOUT
  if (timeout) {
    const parsed = configSchema.shape.probe_timeout.safeParse(timeout)
    if (parsed.success) {
      next = { ...next, probe_timeout: parsed.data }
    } else {
      logger.warn(`Ignoring CHAIN_DOCTOR_PROBE_TIMEOUT=${timeout} (expected a duration such as 5s)`)
    }
  }

  return next
}

/**
 * Write top-level keys back to the settings file, keeping everything else in it.
 * Returns the path written.
 */
export async function saveConfig(patch: Partial<Config>, options: { cwd?: string } = {}): Promise<string> {
  const filePath = resolveWritePath(options.cwd)
  const existing = existsSync(filePath) ? await parseYamlFile(filePath) : {}
  const next = { ...existing, ...patch }

  const result = configSchema.safeParse(next)
  if (!result.success) {
    throw AppError.configInvalid(result.error.issues.map(i => i.message).join('; '))
  }

  await writeFile(filePath, YAML.stringify(next), 'utf-8')
  logger.debug(`Settings written to ${filePath}`)
  cachedConfig = null
  return filePath
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
