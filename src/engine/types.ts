/**
 * Request to install the roles listed in a requirements descriptor.
 */
export type ResolveRequest = {
  /** Absolute path to the requirements descriptor */
  descriptor: string;
  /** Directory the roles are installed into */
  targetDir: string;
}

/**
 * Result of a resolver invocation.
 */
export type ResolveResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Invocation start timestamp */
  startedAt: Date;
  /** Invocation end timestamp */
  finishedAt: Date;
  /** Error message if the resolver could not be run */
  error?: string;
}
