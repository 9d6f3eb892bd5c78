import {writeFile} from 'node:fs/promises'
import type {StagingArea} from '../engine/staging-area.js'
import {RUNTIME_REQUIREMENTS_FILE} from './layout.js'

const RUNTIME_PACKAGE = 'ansible'

/**
 * Lists the runtime requirements installed on the target machine.
 *
 * The runtime itself comes first, pinned when a version is given and
 * unpinned otherwise (resolved by the target's installer, not at build
 * time). Extra specifiers follow verbatim, in caller order.
 */
export function composeRuntimeRequirements(ansibleVersion: string | undefined, pythonPackages: readonly string[]): string[] {
  const runtime = ansibleVersion ? `${RUNTIME_PACKAGE}==${ansibleVersion}` : RUNTIME_PACKAGE
  return [runtime, ...pythonPackages]
}

/**
 * Writes `requirements.txt` into the staging area.
 * @returns Written lines
 */
export async function writeRuntimeRequirements(
  area: StagingArea,
  ansibleVersion: string | undefined,
  pythonPackages: readonly string[]
): Promise<string[]> {
  const lines = composeRuntimeRequirements(ansibleVersion, pythonPackages)
  await writeFile(area.path(RUNTIME_REQUIREMENTS_FILE), lines.map(line => `${line}\n`).join(''))
  return lines
}
