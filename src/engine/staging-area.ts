import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join, relative, isAbsolute} from 'node:path'
import {StagingError} from '../errors.js'

const STAGING_PREFIX = 'playpack-'

/**
 * Ephemeral directory owned by a single build.
 *
 * The staging area mirrors the future bundle contents. Stages populate it
 * in order, and the packager archives it as the last step.
 *
 * ## Lifecycle
 *
 * 1. `acquire()` creates `{tmpRoot}/playpack-XXXXXX` (mode 0700, unique suffix)
 * 2. Build stages write into `root`
 * 3. `release()` removes the directory recursively
 *
 * Prefer `StagingArea.use()`, which releases the area on every exit path.
 * Areas that are still alive can be released from a signal handler with
 * `StagingArea.releaseAll()`.
 *
 * @example
 * ```typescript
 * const result = await StagingArea.use(async area => {
 *   await writeFile(area.path('playbook.yml'), content)
 *   return packageBundle({stagingRoot: area.root, ...})
 * })
 * ```
 */
export class StagingArea {
  private static readonly live = new Set<StagingArea>()

  /**
   * Creates a new staging area.
   * @param options.tmpRoot - Parent directory (defaults to the OS temp directory)
   * @throws {StagingError} If the directory cannot be created
   */
  static async acquire(options?: {tmpRoot?: string}): Promise<StagingArea> {
    try {
      const root = await mkdtemp(join(options?.tmpRoot ?? tmpdir(), STAGING_PREFIX))
      const area = new StagingArea(root)
      StagingArea.live.add(area)
      return area
    } catch (error) {
      throw new StagingError('Failed to create staging area', {cause: error})
    }
  }

  /**
   * Runs `fn` with a fresh staging area and releases it afterwards,
   * whether `fn` resolves or rejects. When `fn` rejects, its error is
   * rethrown even if the release fails too.
   */
  static async use<T>(fn: (area: StagingArea) => Promise<T>, options?: {tmpRoot?: string}): Promise<T> {
    const area = await StagingArea.acquire(options)
    let result: T
    try {
      result = await fn(area)
    } catch (error) {
      // Rethrow the stage failure; a failed removal becomes its cause
      await area.release().catch((releaseError: unknown) => {
        if (error instanceof Error && error.cause === undefined) {
          error.cause = releaseError
        }
      })
      throw error
    }

    await area.release()
    return result
  }

  /**
   * Releases every staging area acquired by this process and not yet released.
   * Called from SIGINT/SIGTERM handlers.
   */
  static async releaseAll(): Promise<void> {
    await Promise.all([...StagingArea.live].map(async area => area.release()))
  }

  private released = false

  private constructor(readonly root: string) {}

  get isReleased(): boolean {
    return this.released
  }

  /**
   * Resolves a path inside the staging area.
   * @throws {StagingError} If the path escapes the staging root
   */
  path(...segments: string[]): string {
    const target = join(this.root, ...segments)
    const rel = relative(this.root, target)
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new StagingError(`Path escapes staging area: ${segments.join('/')}`)
    }

    return target
  }

  /**
   * Recursively removes the staging directory. Safe to call more than once;
   * after a failed removal the area stays live and can be released again.
   */
  async release(): Promise<void> {
    if (this.released) {
      return
    }

    try {
      await rm(this.root, {recursive: true, force: true})
    } catch (error) {
      throw new StagingError(`Failed to remove staging area ${this.root}`, {cause: error})
    }

    this.released = true
    StagingArea.live.delete(this)
  }
}
