import {chmod, copyFile} from 'node:fs/promises'
import {StagingError} from '../errors.js'
import type {StagingArea} from '../engine/staging-area.js'
import type {RuntimeAssets} from '../types.js'
import {ENTRYPOINT_FILE} from './layout.js'

/** rwxr-x--- */
export const ENTRYPOINT_MODE = 0o750

/**
 * Copies the runtime entrypoint into the staging area and makes it
 * executable by owner and group.
 * @returns Absolute path of the installed entrypoint
 */
export async function installEntrypoint(area: StagingArea, assets: RuntimeAssets): Promise<string> {
  const target = area.path(ENTRYPOINT_FILE)
  try {
    await copyFile(assets.entrypoint, target)
    await chmod(target, ENTRYPOINT_MODE)
  } catch (error) {
    throw new StagingError(`Failed to install entrypoint from ${assets.entrypoint}`, {cause: error})
  }

  return target
}
