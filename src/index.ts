/**
 * Library entry point.
 *
 * The CLI (src/cli/index.ts) is a thin layer over these exports.
 *
 * @example
 * ```typescript
 * import {BundleBuilder, ConsoleReporter, GalaxyCliResolver, defaultRuntimeAssets, resolveBuildConfig} from 'playpack'
 *
 * const config = await resolveBuildConfig({playbookFile: 'site.yml', ansibleVersion: '2.14.1'}, {cwd: process.cwd()})
 * const builder = new BundleBuilder({
 *   resolver: new GalaxyCliResolver(),
 *   reporter: new ConsoleReporter(),
 *   assets: defaultRuntimeAssets()
 * })
 *
 * const {outputFile, sha256} = await builder.build(config)
 * ```
 */

export {
  StagingArea,
  DependencyResolver,
  GalaxyCliResolver,
  DEFAULT_RESOLVER_COMMAND,
  type LogLine,
  type OnLogLine,
  type ResolveRequest,
  type ResolveResult
} from './engine/index.js'

export * from './core/index.js'

export {
  PlaypackError,
  ConfigurationError,
  DependencyResolutionError,
  ResolverNotAvailableError,
  StagingError,
  PackagingError,
  BundleError
} from './errors.js'

export type {BuildOptions, BuildConfiguration, BuildResult, ProjectConfig, RuntimeAssets} from './types.js'
export {VERSION} from './version.js'
