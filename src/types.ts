/**
 * Raw build options as supplied by the user (CLI flags merged with the
 * project configuration file). Paths may be relative to the working directory.
 */
export type BuildOptions = {
  playbookFile?: string;
  requirementsFile?: string;
  varsFile?: string;
  extraDeps?: string[];
  ansibleVersion?: string;
  pythonPackages?: string[];
  output?: string;
}

/**
 * Finalized, validated build inputs. Produced once per invocation by
 * `resolveBuildConfig()`; every path is absolute and known to be readable.
 */
export type BuildConfiguration = {
  readonly playbookDir: string;
  readonly playbookFile: string;
  readonly requirementsFile?: string;
  readonly varsFile?: string;
  readonly extraDeps: readonly string[];
  readonly ansibleVersion?: string;
  readonly pythonPackages: readonly string[];
  readonly outputFile: string;
}

/**
 * Project-level `.playpack.yml` settings, read from the playbook directory.
 */
export type ProjectConfig = {
  /** Default runtime version pin */
  ansibleVersion?: string;
  /** Extra runtime packages, installed before the ones given on the command line */
  pythonPackages?: string[];
  /** Extra dependency paths, relative to the playbook directory */
  extraDeps?: string[];
  /** Role resolver executable */
  resolver?: string;
}

/**
 * Fixed files shipped with the tool and copied into every bundle.
 */
export type RuntimeAssets = {
  /** Self-extracting header template with `@@UNCOMPRESS_SKIP@@` and `@@VERSION@@` tokens */
  headerTemplate: string;
  /** Script executed on the target machine after extraction */
  entrypoint: string;
  /** Runtime configuration placed at the bundle root */
  runtimeConfig: string;
}

/**
 * Outcome of a successful build.
 */
export type BuildResult = {
  outputFile: string;
  /** 1-based line number where the archive payload starts */
  skip: number;
  /** Bundle size in bytes */
  size: number;
  /** Hex-encoded SHA-256 digest of the bundle */
  sha256: string;
  /** Archive entries, in archive order */
  entries: string[];
  durationMs: number;
}
