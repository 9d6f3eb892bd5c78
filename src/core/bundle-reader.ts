import {Buffer} from 'node:buffer'
import {createHash} from 'node:crypto'
import {mkdir, readFile} from 'node:fs/promises'
import {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'
import * as tar from 'tar'
import {BundleError} from '../errors.js'

// Headers are a few dozen lines; anything longer is not a bundle.
const MAX_HEADER_LINES = 1000

const GZIP_MAGIC = [0x1F, 0x8B]

export type BundleEntry = {
  path: string;
  type: string;
  size: number;
  mode?: number;
  mtime?: Date;
}

export type BundleHeader = {
  /** 1-based line number where the payload starts */
  skip: number;
  version?: string;
  /** Byte offset of the payload */
  payloadOffset: number;
}

export type BundleInfo = BundleHeader & {
  size: number;
  sha256: string;
  entries: BundleEntry[];
}

/**
 * Returns the byte offset of the start of line `line` (1-based).
 * @throws {BundleError} If the content has fewer lines
 */
export function lineOffset(content: Uint8Array, line: number): number {
  let offset = 0
  for (let current = 1; current < line; current++) {
    const newline = content.indexOf(0x0A, offset)
    if (newline === -1) {
      throw new BundleError(`Invalid bundle: fewer than ${line} lines`)
    }

    offset = newline + 1
  }

  return offset
}

/**
 * Parses the header of a bundle and locates its payload.
 * @throws {BundleError} If no `UNCOMPRESS_SKIP` line is found or the payload is not gzip data
 */
export function parseHeader(content: Uint8Array): BundleHeader {
  let skip: number | undefined
  let version: string | undefined
  let offset = 0

  const inHeader = (line: number) => line <= MAX_HEADER_LINES && (skip === undefined || line < skip)
  for (let line = 1; inHeader(line) && (skip === undefined || version === undefined); line++) {
    const newline = content.indexOf(0x0A, offset)
    if (newline === -1) {
      break
    }

    const text = Buffer.from(content.subarray(offset, newline)).toString('utf8')
    offset = newline + 1

    const skipMatch = /^UNCOMPRESS_SKIP=(\d+)$/.exec(text)
    if (skipMatch) {
      skip = Number(skipMatch[1])
    }

    const versionMatch = /^PLAYPACK_VERSION=(\S+)$/.exec(text)
    if (versionMatch) {
      version = versionMatch[1]
    }
  }

  if (skip === undefined || skip < 1) {
    throw new BundleError('Invalid bundle: UNCOMPRESS_SKIP not found in header')
  }

  const payloadOffset = lineOffset(content, skip)
  if (content[payloadOffset] !== GZIP_MAGIC[0] || content[payloadOffset + 1] !== GZIP_MAGIC[1]) {
    throw new BundleError(`Invalid bundle: no gzip data at line ${skip}`)
  }

  return {skip, version, payloadOffset}
}

async function readBundleFile(bundlePath: string): Promise<Buffer> {
  try {
    return await readFile(bundlePath)
  } catch (error) {
    throw new BundleError(`Cannot read bundle ${bundlePath}`, {cause: error})
  }
}

/**
 * Reads a bundle's header and lists its archive entries, in archive order.
 */
export async function readBundle(bundlePath: string): Promise<BundleInfo> {
  const content = await readBundleFile(bundlePath)
  const header = parseHeader(content)

  const entries: BundleEntry[] = []
  try {
    await pipeline(
      Readable.from([content.subarray(header.payloadOffset)]),
      tar.list({
        onReadEntry(entry) {
          entries.push({
            path: entry.path,
            type: entry.type,
            size: entry.size,
            mode: entry.mode,
            mtime: entry.mtime
          })
        }
      })
    )
  } catch (error) {
    throw new BundleError('Invalid bundle: archive payload is corrupted', {cause: error})
  }

  return {
    ...header,
    size: content.length,
    sha256: createHash('sha256').update(content).digest('hex'),
    entries
  }
}

/**
 * Extracts a bundle's payload into `targetDir`, the way the header script
 * does on the target machine.
 */
export async function extractBundle(bundlePath: string, targetDir: string): Promise<BundleHeader> {
  const content = await readBundleFile(bundlePath)
  const header = parseHeader(content)
  await mkdir(targetDir, {recursive: true})

  try {
    await pipeline(
      Readable.from([content.subarray(header.payloadOffset)]),
      tar.extract({cwd: targetDir})
    )
  } catch (error) {
    throw new BundleError('Invalid bundle: archive payload is corrupted', {cause: error})
  }

  return header
}
