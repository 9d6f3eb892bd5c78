export {BundleBuilder, type BundleBuilderOptions} from './bundle-builder.js'
export {resolveBuildConfig, defaultOutputFile} from './build-config.js'
export {loadProjectConfig, applyProjectConfig, PROJECT_CONFIG_FILE} from './project-config.js'
export {assembleContent, buildCopyFilter, type OnCopied} from './content-assembler.js'
export {materializeDependencies, stripMetadataFiles, type MaterializeResult} from './dependency-materializer.js'
export {composeRuntimeRequirements, writeRuntimeRequirements} from './runtime-requirements.js'
export {installEntrypoint, ENTRYPOINT_MODE} from './entrypoint.js'
export {
  packageBundle,
  renderHeader,
  countLines,
  listEntries,
  normalizeTimestamps,
  createArchive,
  REFERENCE_TIME,
  BUNDLE_MODE,
  SKIP_TOKEN,
  VERSION_TOKEN,
  type PackageOptions,
  type PackageResult
} from './packager.js'
export {
  readBundle,
  extractBundle,
  parseHeader,
  lineOffset,
  type BundleEntry,
  type BundleHeader,
  type BundleInfo
} from './bundle-reader.js'
export {defaultRuntimeAssets} from './assets.js'
export {
  ConsoleReporter,
  STAGES,
  type Reporter,
  type BuildEvent,
  type StageId,
  type StageRef
} from './reporter.js'
export {formatSize, formatDuration} from './utils.js'
export * from './layout.js'
