import {cp, stat} from 'node:fs/promises'
import {basename, join, relative} from 'node:path'
import ignore from 'ignore'
import {StagingError} from '../errors.js'
import type {StagingArea} from '../engine/staging-area.js'
import type {BuildConfiguration, RuntimeAssets} from '../types.js'
import {
  PLAYBOOK_FILE,
  REQUIREMENTS_FILE,
  ROLES_DIR,
  RUNTIME_CONFIG_FILE,
  VARS_FILE
} from './layout.js'
import {toPosixPath} from './utils.js'

const DEFAULT_IGNORES = [
  '.git',
  '__pycache__',
  '.DS_Store',
  '*.pyc',
  '*.retry'
]

/** Called after each item lands in the staging area. */
export type OnCopied = (source: string, target: string) => void

/**
 * Builds a filter that drops VCS and interpreter litter from directory copies.
 * @param sourceRoot - Root of the directory being copied
 */
export function buildCopyFilter(sourceRoot: string): (source: string) => boolean {
  const ig = ignore().add(DEFAULT_IGNORES)

  return (source: string) => {
    const rel = toPosixPath(relative(sourceRoot, source))
    if (rel === '') {
      return true
    }

    return !ig.ignores(rel) && !ig.ignores(rel + '/')
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

async function copyInto(source: string, target: string, onCopied: OnCopied): Promise<void> {
  try {
    await cp(source, target, {
      recursive: true,
      dereference: true,
      preserveTimestamps: true,
      errorOnExist: true,
      force: false,
      filter: buildCopyFilter(source)
    })
  } catch (error) {
    throw new StagingError(`Failed to copy ${source} into the staging area`, {cause: error})
  }

  onCopied(source, target)
}

/**
 * Copies everything the target runtime needs into the staging area.
 *
 * Symbolic links are followed so the bundle carries file contents, never
 * links into the build machine's filesystem. Modification times are kept
 * here and normalized later by the packager.
 *
 * @returns Staging-relative names of the copied entries, in copy order
 * @throws {StagingError} If a copy fails
 */
export async function assembleContent(
  config: BuildConfiguration,
  area: StagingArea,
  assets: RuntimeAssets,
  onCopied: OnCopied = () => {/* noop */}
): Promise<string[]> {
  const copied: string[] = []
  const copy = async (source: string, name: string) => {
    await copyInto(source, area.path(name), onCopied)
    copied.push(name)
  }

  await copy(config.playbookFile, PLAYBOOK_FILE)

  const rolesDir = join(config.playbookDir, ROLES_DIR)
  if (await isDirectory(rolesDir)) {
    await copy(rolesDir, ROLES_DIR)
  }

  if (config.requirementsFile) {
    await copy(config.requirementsFile, REQUIREMENTS_FILE)
  }

  if (config.varsFile) {
    await copy(config.varsFile, VARS_FILE)
  }

  for (const dep of config.extraDeps) {
    await copy(dep, basename(dep))
  }

  await copy(assets.runtimeConfig, RUNTIME_CONFIG_FILE)

  return copied
}
