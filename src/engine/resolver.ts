import type {ResolveRequest, ResolveResult} from './types.js'

/**
 * Log line from a resolver invocation.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during resolution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for installing external role dependencies.
 *
 * Implementations:
 * - `GalaxyCliResolver`: runs `ansible-galaxy install`
 * - Tests use an in-process fake writing role trees directly
 *
 * The resolver is responsible for:
 * - Installing every role listed in the descriptor under the target directory
 * - Reporting overall success through its exit code
 * - Naming the per-role metadata files it leaves behind, so they can be stripped
 */
export abstract class DependencyResolver {
  /**
   * File names the resolver writes next to each installed role that record
   * install-time facts (timestamps, source versions) rather than declared inputs.
   */
  abstract readonly metadataFileNames: readonly string[]

  /**
   * Verifies that the resolver is available and functional.
   * @throws If the resolver is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Installs the roles listed in `request.descriptor`.
   * Individual role failures are tolerated; only the overall exit code matters.
   * @param request - Descriptor and install target
   * @param onLogLine - Callback for real-time stdout/stderr logs
   * @returns Result with exitCode, timestamps, and optional error
   */
  abstract resolve(request: ResolveRequest, onLogLine: OnLogLine): Promise<ResolveResult>
}
