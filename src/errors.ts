export class PlaypackError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'PlaypackError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigurationError extends PlaypackError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONFIGURATION_ERROR', message, options)
    this.name = 'ConfigurationError'
  }
}

// -- Dependency errors -------------------------------------------------------

export class DependencyResolutionError extends PlaypackError {
  constructor(
    readonly exitCode: number,
    message = `Role dependency resolution failed with exit code ${exitCode}`,
    options?: {cause?: unknown; code?: string}
  ) {
    super(options?.code ?? 'DEPENDENCY_RESOLUTION_FAILED', message, options)
    this.name = 'DependencyResolutionError'
  }
}

export class ResolverNotAvailableError extends DependencyResolutionError {
  constructor(command: string, options?: {cause?: unknown}) {
    super(127, `Role resolver "${command}" not found. Please install Ansible.`, {...options, code: 'RESOLVER_NOT_AVAILABLE'})
    this.name = 'ResolverNotAvailableError'
  }
}

// -- Staging errors ----------------------------------------------------------

export class StagingError extends PlaypackError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

// -- Bundle errors -----------------------------------------------------------

export class PackagingError extends PlaypackError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('PACKAGING_FAILED', message, options)
    this.name = 'PackagingError'
  }
}

export class BundleError extends PlaypackError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_BUNDLE', message, options)
    this.name = 'BundleError'
  }
}

