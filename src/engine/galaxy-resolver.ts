import {execa} from 'execa'
import {ResolverNotAvailableError} from '../errors.js'
import type {ResolveRequest, ResolveResult} from './types.js'
import {DependencyResolver, type OnLogLine} from './resolver.js'

export const DEFAULT_RESOLVER_COMMAND = 'ansible-galaxy'

/**
 * Resolver backed by the `ansible-galaxy` CLI.
 *
 * Roles are installed with `--ignore-errors`: a role that fails to install
 * does not stop the others, and the command's overall exit status decides
 * whether the build goes on.
 */
export class GalaxyCliResolver extends DependencyResolver {
  readonly metadataFileNames = ['.galaxy_install_info'] as const

  constructor(readonly command: string = DEFAULT_RESOLVER_COMMAND) {
    super()
  }

  async check(): Promise<void> {
    try {
      await execa(this.command, ['--version'])
    } catch (error) {
      throw new ResolverNotAvailableError(this.command, {cause: error})
    }
  }

  async resolve(request: ResolveRequest, onLogLine: OnLogLine): Promise<ResolveResult> {
    const startedAt = new Date()
    const args = [
      'install',
      '--ignore-errors',
      '--role-file',
      request.descriptor,
      '--roles-path',
      request.targetDir
    ]

    let exitCode = 0
    let error: string | undefined

    try {
      const proc = execa(this.command, args, {
        reject: false,
        stdin: 'ignore',
        env: {ANSIBLE_NOCOLOR: '1'}
      })

      const stdoutDone = (async () => {
        for await (const line of proc.iterable({from: 'stdout'})) {
          onLogLine({stream: 'stdout', line})
        }
      })()

      const stderrDone = (async () => {
        for await (const line of proc.iterable({from: 'stderr'})) {
          onLogLine({stream: 'stderr', line})
        }
      })()

      const result = await proc
      await Promise.all([stdoutDone, stderrDone])
      exitCode = result.exitCode ?? 1
      if (result.failed && result.exitCode === undefined) {
        error = `Failed to run ${this.command}`
      }
    } catch (error_) {
      exitCode = 1
      error = error_ instanceof Error ? error_.message : String(error_)
    }

    return {exitCode, startedAt, finishedAt: new Date(), error}
  }
}
