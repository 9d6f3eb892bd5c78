import pino from 'pino'

export type StageId = 'assemble' | 'materialize' | 'requirements' | 'entrypoint' | 'package'

/** Reference to a build stage for display and keying purposes. */
export type StageRef = {
  id: StageId;
  displayName: string;
}

export const STAGES: Readonly<Record<StageId, StageRef>> = {
  assemble: {id: 'assemble', displayName: 'Assemble content'},
  materialize: {id: 'materialize', displayName: 'Install role dependencies'},
  requirements: {id: 'requirements', displayName: 'Write runtime requirements'},
  entrypoint: {id: 'entrypoint', displayName: 'Install entrypoint'},
  package: {id: 'package', displayName: 'Package bundle'}
}

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. BUILD_START - Configuration resolved, staging area acquired
 * 2. For each stage:
 *    a. STAGE_STARTING
 *    b. CONTENT_COPIED / METADATA_STRIPPED while the stage works
 *    c. STAGE_FINISHED, STAGE_SKIPPED or STAGE_FAILED
 * 3. BUILD_FINISHED - Bundle written
 *    OR BUILD_FAILED - Build stopped, nothing written
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  playbookFile: string;
  outputFile: string;
}

export type StageStartingEvent = {
  event: 'STAGE_STARTING';
  stage: StageRef;
}

export type StageFinishedEvent = {
  event: 'STAGE_FINISHED';
  stage: StageRef;
  durationMs: number;
}

export type StageSkippedEvent = {
  event: 'STAGE_SKIPPED';
  stage: StageRef;
  reason: string;
}

export type StageFailedEvent = {
  event: 'STAGE_FAILED';
  stage: StageRef;
  error: string;
  exitCode?: number;
}

export type ContentCopiedEvent = {
  event: 'CONTENT_COPIED';
  stage: StageRef;
  source: string;
  target: string;
}

export type MetadataStrippedEvent = {
  event: 'METADATA_STRIPPED';
  stage: StageRef;
  path: string;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  outputFile: string;
  size: number;
  sha256: string;
  durationMs: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  error: string;
}

export type BuildEvent =
  | BuildStartEvent
  | StageStartingEvent
  | StageFinishedEvent
  | StageSkippedEvent
  | StageFailedEvent
  | ContentCopiedEvent
  | MetadataStrippedEvent
  | BuildFinishedEvent
  | BuildFailedEvent

/**
 * Interface for reporting build events.
 */
export type Reporter = {
  /** Reports build and stage state transitions */
  emit(event: BuildEvent): void;
  /** Reports output of external tools run by a stage */
  log(stage: StageRef, stream: 'stdout' | 'stderr', line: string): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {destination?: pino.DestinationStream}) {
    this.logger = options?.destination
      ? pino({level: 'info'}, options.destination)
      : pino({level: 'info'})
  }

  emit(event: BuildEvent): void {
    if (event.event === 'BUILD_FAILED' || event.event === 'STAGE_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }

  log(stage: StageRef, stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({stageId: stage.id, stream, line})
  }
}
