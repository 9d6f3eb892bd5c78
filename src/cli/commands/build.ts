import process from 'node:process'
import {dirname, resolve} from 'node:path'
import type {Command} from 'commander'
import {defaultRuntimeAssets} from '../../core/assets.js'
import {resolveBuildConfig} from '../../core/build-config.js'
import {BundleBuilder} from '../../core/bundle-builder.js'
import {applyProjectConfig, loadProjectConfig} from '../../core/project-config.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {DEFAULT_RESOLVER_COMMAND, GalaxyCliResolver} from '../../engine/galaxy-resolver.js'
import {StagingArea} from '../../engine/staging-area.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {collect, getGlobalOptions} from '../utils.js'

type BuildCommandOptions = {
  playbookFile?: string;
  requirementsFile?: string;
  varsFile?: string;
  extraDeps: string[];
  ansibleVersion?: string;
  pythonPackage: string[];
  output?: string;
  verbose?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build', {isDefault: true})
    .description('Package a playbook into a self-extracting bundle')
    .option('-p, --playbook-file <path>', 'Playbook to package (required)')
    .option('-r, --requirements-file <path>', 'Role requirements file (default: requirements.yml beside the playbook)')
    .option('-e, --vars-file <path>', 'Variables file passed to the playbook')
    .option('-d, --extra-deps <path>', 'Extra file or directory to ship in the bundle (repeatable)', collect, [])
    .option('--ansible-version <version>', 'Pin the Ansible version installed on the target')
    .option('--python-package <spec>', 'Extra Python package installed on the target (repeatable)', collect, [])
    .option('-o, --output <path>', 'Bundle path (default: <playbook>.run beside the playbook)')
    .option('--verbose', 'Show copied files and resolver output')
    .action(async (options: BuildCommandOptions, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const cwd = process.cwd()
      const projectDir = options.playbookFile ? dirname(resolve(cwd, options.playbookFile)) : cwd
      const projectConfig = await loadProjectConfig(projectDir)

      const config = await resolveBuildConfig(applyProjectConfig({
        playbookFile: options.playbookFile,
        requirementsFile: options.requirementsFile,
        varsFile: options.varsFile,
        extraDeps: options.extraDeps,
        ansibleVersion: options.ansibleVersion,
        pythonPackages: options.pythonPackage,
        output: options.output
      }, projectConfig, projectDir), {cwd})

      const resolver = new GalaxyCliResolver(process.env.PLAYPACK_RESOLVER ?? projectConfig.resolver ?? DEFAULT_RESOLVER_COMMAND)
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const builder = new BundleBuilder({resolver, reporter, assets: defaultRuntimeAssets()})

      const onSignal = (signal: NodeJS.Signals) => {
        void (async () => {
          await StagingArea.releaseAll()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        await builder.build(config)
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
