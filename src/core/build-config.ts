import {access, constants, stat} from 'node:fs/promises'
import {basename, dirname, extname, join, resolve} from 'node:path'
import {ConfigurationError} from '../errors.js'
import type {BuildConfiguration, BuildOptions} from '../types.js'
import {RESERVED_NAMES} from './layout.js'

const DEFAULT_REQUIREMENTS_FILE = 'requirements.yml'
const BUNDLE_EXTENSION = '.run'

// Written as `ansible==<version>`, so no operators.
const VERSION_PATTERN = /^[\w.+!*-]+$/

async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK)
    return true
  } catch {
    return false
  }
}

async function requireReadable(path: string, label: string): Promise<string> {
  if (!await isReadable(path)) {
    throw new ConfigurationError(`${label} not found or not readable: ${path}`)
  }

  return path
}

async function requireWritableDir(path: string): Promise<void> {
  try {
    const stats = await stat(path)
    if (!stats.isDirectory()) {
      throw new ConfigurationError(`Output directory is not a directory: ${path}`)
    }

    await access(path, constants.W_OK)
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      throw error
    }

    throw new ConfigurationError(`Output directory does not exist or is not writable: ${path}`, {cause: error})
  }
}

/**
 * Derives the default bundle path: `<playbook_dir>/<playbook_name>.run`.
 */
export function defaultOutputFile(playbookFile: string): string {
  const name = basename(playbookFile, extname(playbookFile))
  return join(dirname(playbookFile), `${name}${BUNDLE_EXTENSION}`)
}

/**
 * Validates raw build options and resolves every default exactly once.
 * Runs before any staging so that a bad path never leaves anything behind.
 *
 * @param options - Raw options (CLI flags merged with project configuration)
 * @param context.cwd - Directory relative paths are resolved against
 * @throws {ConfigurationError} When a mandatory or declared path is missing or unreadable
 */
export async function resolveBuildConfig(options: BuildOptions, context: {cwd: string}): Promise<BuildConfiguration> {
  if (!options.playbookFile) {
    throw new ConfigurationError('A playbook file is required (--playbook-file)')
  }

  const playbookFile = await requireReadable(resolve(context.cwd, options.playbookFile), 'Playbook file')
  if (!(await stat(playbookFile)).isFile()) {
    throw new ConfigurationError(`Playbook file is not a regular file: ${playbookFile}`)
  }

  const playbookDir = dirname(playbookFile)

  let requirementsFile: string | undefined
  if (options.requirementsFile) {
    requirementsFile = await requireReadable(resolve(context.cwd, options.requirementsFile), 'Requirements file')
  } else {
    const candidate = join(playbookDir, DEFAULT_REQUIREMENTS_FILE)
    requirementsFile = await isReadable(candidate) ? candidate : undefined
  }

  const varsFile = options.varsFile
    ? await requireReadable(resolve(context.cwd, options.varsFile), 'Vars file')
    : undefined

  const extraDeps: string[] = []
  const extraNames = new Set<string>()
  for (const dep of options.extraDeps ?? []) {
    const path = await requireReadable(resolve(context.cwd, dep), 'Extra dependency')
    const name = basename(path)
    if (RESERVED_NAMES.has(name)) {
      throw new ConfigurationError(`Extra dependency "${name}" clashes with a reserved bundle entry: ${path}`)
    }

    if (extraNames.has(name)) {
      throw new ConfigurationError(`Two extra dependencies share the name "${name}": ${path}`)
    }

    extraNames.add(name)
    extraDeps.push(path)
  }

  if (options.ansibleVersion !== undefined && !VERSION_PATTERN.test(options.ansibleVersion)) {
    throw new ConfigurationError(`Invalid Ansible version: "${options.ansibleVersion}"`)
  }

  const outputFile = options.output
    ? resolve(context.cwd, options.output)
    : defaultOutputFile(playbookFile)
  await requireWritableDir(dirname(outputFile))

  return Object.freeze({
    playbookDir,
    playbookFile,
    requirementsFile,
    varsFile,
    extraDeps: Object.freeze(extraDeps),
    ansibleVersion: options.ansibleVersion,
    pythonPackages: Object.freeze([...options.pythonPackages ?? []]),
    outputFile
  })
}
