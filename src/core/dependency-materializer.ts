import {access, mkdir, readdir, rm} from 'node:fs/promises'
import {join, relative} from 'node:path'
import {DependencyResolutionError} from '../errors.js'
import type {StagingArea} from '../engine/staging-area.js'
import type {DependencyResolver, OnLogLine} from '../engine/resolver.js'
import {EXTERNAL_ROLES_DIR, REQUIREMENTS_FILE} from './layout.js'
import {toPosixPath} from './utils.js'

export type MaterializeResult = {
  /** False when the staging area holds no requirements descriptor */
  resolved: boolean;
  /** Staging-relative paths of the metadata files removed */
  stripped: string[];
}

/**
 * Removes every file named in `names` anywhere under `dir`.
 * @returns Absolute paths of the removed files, sorted
 */
export async function stripMetadataFiles(dir: string, names: readonly string[]): Promise<string[]> {
  const removed: string[] = []
  const entries = await readdir(dir, {withFileTypes: true})
  for (const entry of entries) {
    const fullPath = join(dir, entry.name)
    if (entry.isDirectory()) {
      removed.push(...await stripMetadataFiles(fullPath, names))
    } else if (names.includes(entry.name)) {
      await rm(fullPath, {force: true})
      removed.push(fullPath)
    }
  }

  return removed.sort()
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/**
 * Installs external roles listed in the staged requirements descriptor into
 * `external_roles/`, then strips the resolver's per-role install metadata.
 *
 * Does nothing when no descriptor was staged.
 *
 * @throws {DependencyResolutionError} When the resolver exits non-zero or cannot be run
 * @throws {ResolverNotAvailableError} When the resolver is not installed
 */
export async function materializeDependencies(
  area: StagingArea,
  resolver: DependencyResolver,
  onLogLine: OnLogLine = () => {/* noop */}
): Promise<MaterializeResult> {
  const descriptor = area.path(REQUIREMENTS_FILE)
  if (!await exists(descriptor)) {
    return {resolved: false, stripped: []}
  }

  await resolver.check()
  const targetDir = area.path(EXTERNAL_ROLES_DIR)
  await mkdir(targetDir, {recursive: true})

  const result = await resolver.resolve({descriptor, targetDir}, onLogLine)
  if (result.exitCode !== 0) {
    throw new DependencyResolutionError(
      result.exitCode,
      result.error
        ? `Role dependency resolution failed: ${result.error}`
        : `Role dependency resolution failed with exit code ${result.exitCode}`
    )
  }

  const stripped = await stripMetadataFiles(targetDir, resolver.metadataFileNames)
  return {
    resolved: true,
    stripped: stripped.map(path => toPosixPath(relative(area.root, path)))
  }
}
