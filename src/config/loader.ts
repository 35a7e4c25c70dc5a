/**
 * YAML configuration loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { ZodError } from 'zod'
import { validateConfig, validateConfigSafe, type QuorumUniquenessConfig } from './schema'
import { ConfigurationError } from './environment'

export const CONFIG_PATH_ENV = 'QUNIQUE_CONFIG_PATH'

export const DEFAULT_CONFIG_PATHS = [
  'quorum-uniqueness.yaml',
  'quorum-uniqueness.yml',
  'config/quorum-uniqueness.yaml',
  'config/quorum-uniqueness.yml',
]

/**
 * Load and validate config from YAML file
 * @throws ConfigurationError if file doesn't exist, doesn't parse or fails validation
 */
export function loadConfig(filePath: string): QuorumUniquenessConfig {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, { searchedPaths: [absolutePath] })
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfig(rawConfig)
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      throw new ConfigurationError(`Invalid config in ${filePath}: ${issues.join('; ')}`, { issues })
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config from ${filePath}: ${error.message}`)
    }
    throw error
  }
}

/**
 * Load config with detailed error reporting
 * Returns success/failure with error messages
 */
export function loadConfigSafe(
  filePath: string
): { success: true; data: QuorumUniquenessConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`],
    }
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfigSafe(rawConfig)
  } catch (error) {
    return {
      success: false,
      errors: [`Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`],
    }
  }
}

/**
 * Load config from the path in QUNIQUE_CONFIG_PATH, else the first default
 * location that exists. Returns undefined when no file is found.
 */
export function loadConfigAuto(env: NodeJS.ProcessEnv = process.env): QuorumUniquenessConfig | undefined {
  const configPath = env[CONFIG_PATH_ENV]

  if (configPath) {
    return loadConfig(configPath)
  }

  for (const path of DEFAULT_CONFIG_PATHS) {
    if (existsSync(path)) {
      return loadConfig(path)
    }
  }

  return undefined
}
