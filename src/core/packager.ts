import {Buffer} from 'node:buffer'
import {createHash, randomUUID} from 'node:crypto'
import {appendFile, chmod, lutimes, readdir, readFile, rename, rm, utimes, writeFile} from 'node:fs/promises'
import {join, relative} from 'node:path'
import {buffer as streamToBuffer} from 'node:stream/consumers'
import * as tar from 'tar'
import {PackagingError, PlaypackError} from '../errors.js'
import {toPosixPath} from './utils.js'

export const SKIP_TOKEN = '@@UNCOMPRESS_SKIP@@'
export const VERSION_TOKEN = '@@VERSION@@'

/** Every staged file and directory is stamped with this time before archiving. */
export const REFERENCE_TIME = new Date('2020-01-01T00:00:00Z')

/** rwxr-xr-x */
export const BUNDLE_MODE = 0o755

const VERSION_PATTERN = /^[\w.+-]+$/

export type PackageOptions = {
  stagingRoot: string;
  outputFile: string;
  /** Path to the header template */
  headerTemplate: string;
  /** Version string written into the header */
  version: string;
}

export type PackageResult = {
  outputFile: string;
  /** 1-based line number where the archive payload starts */
  skip: number;
  size: number;
  sha256: string;
  entries: string[];
}

export function countLines(content: string | Uint8Array): number {
  let count = 0
  for (const byte of typeof content === 'string' ? Buffer.from(content) : content) {
    if (byte === 0x0A) {
      count++
    }
  }

  return count
}

/**
 * Substitutes the skip count and version into the header template.
 * Both tokens must appear in the template and the result must keep the
 * template's line count, since `skip` was derived from it.
 * @throws {PackagingError} On a malformed template or version
 */
export function renderHeader(template: string, skip: number, version: string): string {
  if (!template.endsWith('\n')) {
    throw new PackagingError('Header template must end with a newline')
  }

  for (const token of [SKIP_TOKEN, VERSION_TOKEN]) {
    if (!template.includes(token)) {
      throw new PackagingError(`Header template is missing the ${token} placeholder`)
    }
  }

  if (!VERSION_PATTERN.test(version)) {
    throw new PackagingError(`Invalid bundle version: "${version}"`)
  }

  const header = template
    .replaceAll(SKIP_TOKEN, String(skip))
    .replaceAll(VERSION_TOKEN, version)

  if (countLines(header) !== countLines(template)) {
    throw new PackagingError('Header substitution changed the header line count')
  }

  return header
}

/**
 * Lists every file, directory and link under `root`, as forward-slash
 * relative paths in lexicographic order.
 */
export async function listEntries(root: string): Promise<string[]> {
  const entries: string[] = []
  const walk = async (dir: string) => {
    for (const entry of await readdir(dir, {withFileTypes: true})) {
      const fullPath = join(dir, entry.name)
      entries.push(toPosixPath(relative(root, fullPath)))
      if (entry.isDirectory()) {
        await walk(fullPath)
      }
    }
  }

  await walk(root)
  return entries.sort()
}

/**
 * Sets access and modification time of `root` and everything under it.
 * Links are stamped themselves, not their targets.
 */
export async function normalizeTimestamps(root: string, time: Date = REFERENCE_TIME): Promise<void> {
  for (const entry of await readdir(root, {withFileTypes: true})) {
    const fullPath = join(root, entry.name)
    if (entry.isDirectory()) {
      await normalizeTimestamps(fullPath, time)
    } else if (entry.isSymbolicLink()) {
      await lutimes(fullPath, time, time)
    } else {
      await utimes(fullPath, time, time)
    }
  }

  await utimes(root, time, time)
}

/**
 * Creates a gzip tar of `entries` (relative to `cwd`), in the given order,
 * with portable headers and a fixed mtime.
 *
 * `portable` drops the mtime of directory entries, so it is switched back
 * on per entry: every entry, directories included, carries `mtime`.
 */
export async function createArchive(cwd: string, entries: string[], mtime: Date = REFERENCE_TIME): Promise<Buffer> {
  const stream = tar.create(
    {
      cwd,
      gzip: true,
      portable: true,
      mtime,
      noDirRecurse: true,
      onWriteEntry(entry) {
        entry.noMtime = false
      }
    },
    entries
  )

  return Buffer.from(await streamToBuffer(stream))
}

/**
 * Writes the self-extracting bundle: header script followed by a gzip tar
 * of the staging area.
 *
 * 1. The header template is written as the initial file content
 * 2. `skip` = lines in the file + 1, then the tokens are substituted in place
 * 3. Every staged entry is stamped with `REFERENCE_TIME`
 * 4. The archive of the sorted staging entries is appended
 * 5. The file is made executable and moved onto `outputFile`
 *
 * The bundle is assembled in a sibling `.partial-*` file, removed on
 * failure, so `outputFile` only ever holds a complete bundle.
 *
 * @throws {PackagingError} If any step fails
 */
export async function packageBundle(options: PackageOptions): Promise<PackageResult> {
  const partial = `${options.outputFile}.partial-${randomUUID().slice(0, 8)}`

  try {
    const template = await readFile(options.headerTemplate, 'utf8')
    await writeFile(partial, template)

    const skip = countLines(await readFile(partial)) + 1
    const header = Buffer.from(renderHeader(template, skip, options.version))
    await writeFile(partial, header)

    await normalizeTimestamps(options.stagingRoot)
    const entries = await listEntries(options.stagingRoot)
    const archive = await createArchive(options.stagingRoot, entries)
    await appendFile(partial, archive)

    await chmod(partial, BUNDLE_MODE)
    await rename(partial, options.outputFile)

    const sha256 = createHash('sha256').update(header).update(archive).digest('hex')
    return {
      outputFile: options.outputFile,
      skip,
      size: header.length + archive.length,
      sha256,
      entries
    }
  } catch (error) {
    await rm(partial, {force: true})
    if (error instanceof PlaypackError) {
      throw error
    }

    throw new PackagingError(`Failed to write bundle ${options.outputFile}`, {cause: error})
  }
}
