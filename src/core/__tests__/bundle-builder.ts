import {access, readdir, readFile, utimes} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {DependencyResolutionError} from '../../errors.js'
import {defaultRuntimeAssets} from '../assets.js'
import {resolveBuildConfig} from '../build-config.js'
import {BundleBuilder} from '../bundle-builder.js'
import {extractBundle, readBundle} from '../bundle-reader.js'
import type {BuildEvent} from '../reporter.js'
import {createTmpDir, FakeResolver, noopReporter, recordingReporter, writeProject, writeTree} from '../../__tests__/helpers.js'

const nginxRole = {'acme.nginx': {'tasks/main.yml': '- debug: msg=nginx\n'}}

function transitions(events: BuildEvent[]): string[] {
  return events.flatMap(event => {
    switch (event.event) {
      case 'STAGE_STARTING':
      case 'STAGE_FINISHED':
      case 'STAGE_SKIPPED':
      case 'STAGE_FAILED': {
        return [`${event.event}:${event.stage.id}`]
      }

      case 'BUILD_START':
      case 'BUILD_FINISHED':
      case 'BUILD_FAILED': {
        return [event.event]
      }

      default: {
        return []
      }
    }
  })
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

// -- full build --------------------------------------------------------------

test('build packages the playbook, roles, dependencies and runtime files', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({
    playbookFile: 'site.yml',
    varsFile: 'vars.yml',
    extraDeps: ['files'],
    ansibleVersion: '2.14.1',
    pythonPackages: ['boto==1.2.0']
  }, {cwd: root})

  const builder = new BundleBuilder({
    resolver: new FakeResolver({roles: nginxRole}),
    reporter: noopReporter,
    assets: defaultRuntimeAssets(),
    version: '1.2.3',
    tmpRoot: await createTmpDir()
  })

  const result = await builder.build(config)

  t.is(result.outputFile, join(root, 'site.run'))
  t.is(result.skip, 15)
  t.deepEqual(result.entries, [
    'ansible.cfg',
    'external_roles',
    'external_roles/acme.nginx',
    'external_roles/acme.nginx/meta',
    'external_roles/acme.nginx/tasks',
    'external_roles/acme.nginx/tasks/main.yml',
    'files',
    'files/motd.txt',
    'playbook.yml',
    'requirements.txt',
    'requirements.yml',
    'roles',
    'roles/common',
    'roles/common/tasks',
    'roles/common/tasks/main.yml',
    'run.sh',
    'vars.yml'
  ])

  const info = await readBundle(result.outputFile)
  t.is(info.version, '1.2.3')
  t.is(info.sha256, result.sha256)
  t.deepEqual(info.entries.filter(entry => entry.type === 'File').map(entry => entry.path), [
    'ansible.cfg',
    'external_roles/acme.nginx/tasks/main.yml',
    'files/motd.txt',
    'playbook.yml',
    'requirements.txt',
    'requirements.yml',
    'roles/common/tasks/main.yml',
    'run.sh',
    'vars.yml'
  ])
})

test('build writes runtime requirements and an executable entrypoint', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({
    playbookFile: 'site.yml',
    ansibleVersion: '2.14.1',
    pythonPackages: ['boto==1.2.0', 'botocore==3.1.0']
  }, {cwd: root})

  const builder = new BundleBuilder({
    resolver: new FakeResolver({roles: nginxRole}),
    reporter: noopReporter,
    assets: defaultRuntimeAssets(),
    tmpRoot: await createTmpDir()
  })

  const result = await builder.build(config)
  const info = await readBundle(result.outputFile)
  const entrypoint = info.entries.find(entry => entry.path === 'run.sh')
  t.is((entrypoint?.mode ?? 0) & 0o777, 0o750)

  const target = await createTmpDir()
  await extractBundle(result.outputFile, target)
  t.is(await readFile(join(target, 'requirements.txt'), 'utf8'), 'ansible==2.14.1\nboto==1.2.0\nbotocore==3.1.0\n')
  t.is(
    await readFile(join(target, 'run.sh'), 'utf8'),
    await readFile(defaultRuntimeAssets().entrypoint, 'utf8')
  )
})

test('build never ships resolver install metadata', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({playbookFile: 'site.yml'}, {cwd: root})

  const builder = new BundleBuilder({
    resolver: new FakeResolver({roles: nginxRole}),
    reporter: noopReporter,
    assets: defaultRuntimeAssets(),
    tmpRoot: await createTmpDir()
  })

  const info = await readBundle((await builder.build(config)).outputFile)
  t.false(info.entries.some(entry => entry.path.endsWith('.galaxy_install_info')))
})

// -- reproducibility ---------------------------------------------------------

test('two builds of the same inputs are byte-identical', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  await writeTree(root, {'dist/a/.keep': '', 'dist/b/.keep': ''})

  const build = async (output: string) => {
    const config = await resolveBuildConfig({
      playbookFile: 'site.yml',
      varsFile: 'vars.yml',
      extraDeps: ['files'],
      output
    }, {cwd: root})

    const builder = new BundleBuilder({
      resolver: new FakeResolver({roles: nginxRole}),
      reporter: noopReporter,
      assets: defaultRuntimeAssets(),
      version: '1.2.3',
      tmpRoot: await createTmpDir()
    })
    return builder.build(config)
  }

  const first = await build('dist/a/site.run')

  // Source timestamps differ between the two builds
  const touched = new Date('2024-06-01T12:00:00Z')
  await utimes(join(root, 'site.yml'), touched, touched)
  await utimes(join(root, 'roles', 'common', 'tasks', 'main.yml'), touched, touched)

  const second = await build('dist/b/site.run')

  t.is(first.sha256, second.sha256)
  t.deepEqual(await readFile(first.outputFile), await readFile(second.outputFile))
})

// -- cleanup -----------------------------------------------------------------

test('build releases the staging area after success', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({playbookFile: 'site.yml'}, {cwd: root})
  const tmpRoot = await createTmpDir()

  const builder = new BundleBuilder({
    resolver: new FakeResolver({roles: nginxRole}),
    reporter: noopReporter,
    assets: defaultRuntimeAssets(),
    tmpRoot
  })

  await builder.build(config)
  t.deepEqual(await readdir(tmpRoot), [])
})

test('build leaves no staging area and no bundle when resolution fails', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({playbookFile: 'site.yml'}, {cwd: root})
  const tmpRoot = await createTmpDir()

  const builder = new BundleBuilder({
    resolver: new FakeResolver({exitCode: 4}),
    reporter: noopReporter,
    assets: defaultRuntimeAssets(),
    tmpRoot
  })

  const error = await t.throwsAsync(builder.build(config), {instanceOf: DependencyResolutionError})
  t.is(error?.exitCode, 4)
  t.deepEqual(await readdir(tmpRoot), [])
  t.false(await exists(config.outputFile))
})

// -- events ------------------------------------------------------------------

test('build reports every stage in order', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({playbookFile: 'site.yml'}, {cwd: root})
  const {reporter, events} = recordingReporter()

  const builder = new BundleBuilder({
    resolver: new FakeResolver({roles: nginxRole}),
    reporter,
    assets: defaultRuntimeAssets(),
    tmpRoot: await createTmpDir()
  })

  await builder.build(config)

  t.deepEqual(transitions(events), [
    'BUILD_START',
    'STAGE_STARTING:assemble',
    'STAGE_FINISHED:assemble',
    'STAGE_STARTING:materialize',
    'STAGE_FINISHED:materialize',
    'STAGE_STARTING:requirements',
    'STAGE_FINISHED:requirements',
    'STAGE_STARTING:entrypoint',
    'STAGE_FINISHED:entrypoint',
    'STAGE_STARTING:package',
    'STAGE_FINISHED:package',
    'BUILD_FINISHED'
  ])
})

test('build reports copies, stripped metadata and resolver output', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({playbookFile: 'site.yml'}, {cwd: root})
  const {reporter, events, logs} = recordingReporter()

  const builder = new BundleBuilder({
    resolver: new FakeResolver({roles: nginxRole}),
    reporter,
    assets: defaultRuntimeAssets(),
    tmpRoot: await createTmpDir()
  })

  await builder.build(config)

  const copied = events.flatMap(event => event.event === 'CONTENT_COPIED' ? [event.source] : [])
  t.deepEqual(copied, [
    join(root, 'site.yml'),
    join(root, 'roles'),
    join(root, 'requirements.yml'),
    defaultRuntimeAssets().runtimeConfig
  ])

  const stripped = events.flatMap(event => event.event === 'METADATA_STRIPPED' ? [event.path] : [])
  t.deepEqual(stripped, ['external_roles/acme.nginx/meta/.galaxy_install_info'])

  t.deepEqual(logs.map(({stage, stream, line}) => [stage.id, stream, line]), [
    ['materialize', 'stdout', '- acme.nginx was installed successfully']
  ])
})

test('build skips dependency resolution without a requirements file', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'site.yml': '- hosts: all\n'})
  const config = await resolveBuildConfig({playbookFile: 'site.yml'}, {cwd: root})
  const {reporter, events} = recordingReporter()
  const resolver = new FakeResolver()

  const builder = new BundleBuilder({resolver, reporter, assets: defaultRuntimeAssets(), tmpRoot: await createTmpDir()})
  const result = await builder.build(config)

  t.is(resolver.requests.length, 0)
  t.false(result.entries.includes('external_roles'))

  const skipped = events.find(event => event.event === 'STAGE_SKIPPED')
  t.deepEqual(skipped, {
    event: 'STAGE_SKIPPED',
    stage: {id: 'materialize', displayName: 'Install role dependencies'},
    reason: 'no requirements file'
  })
})

test('build reports the failing stage with the resolver exit code', async t => {
  const root = await createTmpDir()
  await writeProject(root)
  const config = await resolveBuildConfig({playbookFile: 'site.yml'}, {cwd: root})
  const {reporter, events} = recordingReporter()

  const builder = new BundleBuilder({
    resolver: new FakeResolver({exitCode: 4}),
    reporter,
    assets: defaultRuntimeAssets(),
    tmpRoot: await createTmpDir()
  })

  await t.throwsAsync(builder.build(config))

  t.deepEqual(transitions(events), [
    'BUILD_START',
    'STAGE_STARTING:assemble',
    'STAGE_FINISHED:assemble',
    'STAGE_STARTING:materialize',
    'STAGE_FAILED:materialize',
    'BUILD_FAILED'
  ])

  const failed = events.find(event => event.event === 'STAGE_FAILED')
  t.deepEqual(failed, {
    event: 'STAGE_FAILED',
    stage: {id: 'materialize', displayName: 'Install role dependencies'},
    error: 'Role dependency resolution failed with exit code 4',
    exitCode: 4
  })
  t.deepEqual(events.at(-1), {event: 'BUILD_FAILED', error: 'Role dependency resolution failed with exit code 4'})
})
