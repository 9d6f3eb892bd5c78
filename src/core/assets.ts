import {fileURLToPath} from 'node:url'
import {join} from 'node:path'
import type {RuntimeAssets} from '../types.js'

/**
 * Resolves the runtime assets shipped in the package's `assets/` directory.
 * @param assetsDir - Override the directory holding the asset files
 */
export function defaultRuntimeAssets(assetsDir = fileURLToPath(new URL('../../assets/', import.meta.url))): RuntimeAssets {
  return {
    headerTemplate: join(assetsDir, 'header.sh'),
    entrypoint: join(assetsDir, 'run.sh'),
    runtimeConfig: join(assetsDir, 'ansible.cfg')
  }
}
