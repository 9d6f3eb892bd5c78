import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import type {BuildEvent, Reporter, StageRef} from '../core/reporter.js'
import {DependencyResolver, type OnLogLine} from '../engine/resolver.js'
import type {ResolveRequest, ResolveResult} from '../engine/types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'playpack-test-'))
}

/**
 * Writes `files` (relative path → content) under `root`, creating directories.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path)
    await mkdir(dirname(target), {recursive: true})
    await writeFile(target, content)
  }
}

/**
 * Writes a small playbook project: playbook, one local role, a requirements
 * file, a vars file and a `files/` directory usable as an extra dependency.
 */
export async function writeProject(root: string): Promise<{playbookFile: string; varsFile: string; filesDir: string}> {
  await writeTree(root, {
    'site.yml': '- hosts: all\n  roles:\n    - common\n    - acme.nginx\n',
    'roles/common/tasks/main.yml': '- name: Say hello\n  debug:\n    msg: hello\n',
    'requirements.yml': '- src: acme.nginx\n  version: 1.0.0\n',
    'vars.yml': 'greeting: hello\n',
    'files/motd.txt': 'Welcome\n'
  })

  return {
    playbookFile: join(root, 'site.yml'),
    varsFile: join(root, 'vars.yml'),
    filesDir: join(root, 'files')
  }
}

/**
 * Silent reporter: all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

export type RecordedLog = {
  stage: StageRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

/**
 * Returns a reporter that records events and log lines for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]; logs: RecordedLog[]} {
  const events: BuildEvent[] = []
  const logs: RecordedLog[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log(stage, stream, line) {
      logs.push({stage, stream, line})
    }
  }

  return {reporter, events, logs}
}

export type FakeResolverBehavior = {
  /** Exit code returned by resolve() (default 0) */
  exitCode?: number;
  /** Roles to install: role name → (relative path → content) */
  roles?: Record<string, Record<string, string>>;
  /** Lines written to stderr before finishing */
  stderr?: string[];
  /** Error message reported alongside a non-zero exit code */
  error?: string;
}

/**
 * In-process stand-in for `ansible-galaxy`. Installs the configured roles
 * and, like the real tool, drops a `meta/.galaxy_install_info` file holding
 * the install time into each of them.
 */
export class FakeResolver extends DependencyResolver {
  readonly metadataFileNames = ['.galaxy_install_info']
  readonly requests: ResolveRequest[] = []

  constructor(private readonly behavior: FakeResolverBehavior = {}) {
    super()
  }

  async check(): Promise<void> {/* always available */}

  async resolve(request: ResolveRequest, onLogLine: OnLogLine): Promise<ResolveResult> {
    const startedAt = new Date()
    this.requests.push(request)

    for (const line of this.behavior.stderr ?? []) {
      onLogLine({stream: 'stderr', line})
    }

    const exitCode = this.behavior.exitCode ?? 0
    if (exitCode === 0) {
      for (const [role, files] of Object.entries(this.behavior.roles ?? {})) {
        await writeTree(join(request.targetDir, role), {
          ...files,
          'meta/.galaxy_install_info': `install_date: '${new Date().toISOString()}'\nversion: 1.0.0\n`
        })
        onLogLine({stream: 'stdout', line: `- ${role} was installed successfully`})
      }
    }

    return {exitCode, startedAt, finishedAt: new Date(), error: this.behavior.error}
  }
}
