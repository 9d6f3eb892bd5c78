import {DependencyResolutionError} from '../errors.js'
import {StagingArea} from '../engine/staging-area.js'
import type {DependencyResolver} from '../engine/resolver.js'
import type {BuildConfiguration, BuildResult, RuntimeAssets} from '../types.js'
import {VERSION} from '../version.js'
import {assembleContent} from './content-assembler.js'
import {materializeDependencies} from './dependency-materializer.js'
import {installEntrypoint} from './entrypoint.js'
import {packageBundle} from './packager.js'
import {STAGES, type Reporter, type StageRef} from './reporter.js'
import {writeRuntimeRequirements} from './runtime-requirements.js'

export type BundleBuilderOptions = {
  resolver: DependencyResolver;
  reporter: Reporter;
  assets: RuntimeAssets;
  /** Version string written into bundle headers */
  version?: string;
  /** Parent directory for staging areas (defaults to the OS temp directory) */
  tmpRoot?: string;
}

/**
 * Runs the build stages, in order, over one staging area.
 *
 * ## Build Flow
 *
 * 1. **Acquire**: Create a private staging area
 * 2. **Assemble**: Copy playbook, roles, descriptor, vars, extra deps and runtime config
 * 3. **Materialize**: Install external roles and strip their install metadata
 * 4. **Requirements**: Write the runtime requirement manifest
 * 5. **Entrypoint**: Install the runtime entrypoint
 * 6. **Package**: Write the self-extracting bundle
 * 7. **Release**: Remove the staging area, whatever the outcome
 *
 * Stages never run concurrently and nothing is retried: the first failure
 * ends the build and leaves no output file.
 */
export class BundleBuilder {
  private readonly resolver: DependencyResolver
  private readonly reporter: Reporter
  private readonly assets: RuntimeAssets
  private readonly version: string
  private readonly tmpRoot?: string

  constructor(options: BundleBuilderOptions) {
    this.resolver = options.resolver
    this.reporter = options.reporter
    this.assets = options.assets
    this.version = options.version ?? VERSION
    this.tmpRoot = options.tmpRoot
  }

  async build(config: BuildConfiguration): Promise<BuildResult> {
    const startedAt = Date.now()
    this.reporter.emit({event: 'BUILD_START', playbookFile: config.playbookFile, outputFile: config.outputFile})

    try {
      const result = await StagingArea.use(async area => this.runStages(config, area), {tmpRoot: this.tmpRoot})
      const durationMs = Date.now() - startedAt
      this.reporter.emit({
        event: 'BUILD_FINISHED',
        outputFile: result.outputFile,
        size: result.size,
        sha256: result.sha256,
        durationMs
      })

      return {...result, durationMs}
    } catch (error) {
      this.reporter.emit({event: 'BUILD_FAILED', error: error instanceof Error ? error.message : String(error)})
      throw error
    }
  }

  private async runStages(config: BuildConfiguration, area: StagingArea) {
    await this.stage(STAGES.assemble, async () => {
      await assembleContent(config, area, this.assets, (source, target) => {
        this.reporter.emit({event: 'CONTENT_COPIED', stage: STAGES.assemble, source, target})
      })
    })

    await this.stage(STAGES.materialize, async () => {
      const {resolved, stripped} = await materializeDependencies(area, this.resolver, ({stream, line}) => {
        this.reporter.log(STAGES.materialize, stream, line)
      })

      for (const path of stripped) {
        this.reporter.emit({event: 'METADATA_STRIPPED', stage: STAGES.materialize, path})
      }

      return resolved
    }, resolved => resolved ? undefined : 'no requirements file')

    await this.stage(STAGES.requirements, async () => {
      await writeRuntimeRequirements(area, config.ansibleVersion, config.pythonPackages)
    })

    await this.stage(STAGES.entrypoint, async () => {
      await installEntrypoint(area, this.assets)
    })

    return this.stage(STAGES.package, async () => packageBundle({
      stagingRoot: area.root,
      outputFile: config.outputFile,
      headerTemplate: this.assets.headerTemplate,
      version: this.version
    }))
  }

  /**
   * Runs one stage and reports its transitions.
   * @param skipReason - Maps the stage result to a reason when the stage had nothing to do
   */
  private async stage<T>(
    stage: StageRef,
    fn: () => Promise<T>,
    skipReason: (result: T) => string | undefined = () => undefined
  ): Promise<T> {
    const startedAt = Date.now()
    this.reporter.emit({event: 'STAGE_STARTING', stage})

    let result: T
    try {
      result = await fn()
    } catch (error) {
      this.reporter.emit({
        event: 'STAGE_FAILED',
        stage,
        error: error instanceof Error ? error.message : String(error),
        exitCode: error instanceof DependencyResolutionError ? error.exitCode : undefined
      })
      throw error
    }

    const reason = skipReason(result)
    if (reason) {
      this.reporter.emit({event: 'STAGE_SKIPPED', stage, reason})
    } else {
      this.reporter.emit({event: 'STAGE_FINISHED', stage, durationMs: Date.now() - startedAt})
    }

    return result
  }
}
