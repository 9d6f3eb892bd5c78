import {readFile} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigurationError} from '../errors.js'
import type {BuildOptions, ProjectConfig} from '../types.js'

export const PROJECT_CONFIG_FILE = '.playpack.yml'

function readString(config: Map<string, unknown>, key: string): string | undefined {
  const value = config.get(key)
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ConfigurationError(`Invalid ${PROJECT_CONFIG_FILE}: "${key}" must be a string (quote version numbers)`)
  }

  return value
}

function readStringList(config: Map<string, unknown>, key: string): string[] | undefined {
  const value = config.get(key)
  if (value === undefined || value === null) {
    return undefined
  }

  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ConfigurationError(`Invalid ${PROJECT_CONFIG_FILE}: "${key}" must be a list of strings`)
  }

  return value.map(String)
}

/**
 * Loads the project-level `.playpack.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadProjectConfig(dir: string): Promise<ProjectConfig> {
  let content: string
  try {
    content = await readFile(join(dir, PROJECT_CONFIG_FILE), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return {}
    }

    throw new ConfigurationError(`Cannot read ${PROJECT_CONFIG_FILE} in ${dir}`, {cause: error})
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error: unknown) {
    throw new ConfigurationError(`Invalid ${PROJECT_CONFIG_FILE}: not valid YAML`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`Invalid ${PROJECT_CONFIG_FILE}: expected a mapping`)
  }

  const config: Map<string, unknown> = new Map(Object.entries(parsed))
  return {
    ansibleVersion: readString(config, 'ansibleVersion'),
    pythonPackages: readStringList(config, 'pythonPackages'),
    extraDeps: readStringList(config, 'extraDeps'),
    resolver: readString(config, 'resolver')
  }
}

/**
 * Merges project defaults under the command-line options.
 * Scalars from the command line win; lists are concatenated, project entries first.
 * @param projectDir - Directory the project's relative `extraDeps` are resolved against
 */
export function applyProjectConfig(options: BuildOptions, config: ProjectConfig, projectDir: string): BuildOptions {
  return {
    ...options,
    ansibleVersion: options.ansibleVersion ?? config.ansibleVersion,
    extraDeps: [
      ...(config.extraDeps ?? []).map(dep => resolve(projectDir, dep)),
      ...(options.extraDeps ?? [])
    ],
    pythonPackages: [
      ...(config.pythonPackages ?? []),
      ...(options.pythonPackages ?? [])
    ]
  }
}
