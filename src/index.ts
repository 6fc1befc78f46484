/**
 * cloud-audit-pipeline
 *
 * Orchestrates a three-stage cloud security audit (collect → explain →
 * report) over a schema-validated, file-backed artifact store, against live
 * Google Cloud and model endpoints or bundled mock fixtures.
 */

export * from './domain';

export { PipelineController, ControllerError, DEFAULT_CONTROLLER_CONFIG } from './engine/controller';
export type { ControllerConfig, ControllerDependencies } from './engine/controller';
export type { CancellationToken, Stage, StageContext } from './engine/stage';
export { runPool } from './engine/worker-pool';
export type { PoolOptions } from './engine/worker-pool';
export { transitionRunState, isTerminalRunState } from './engine/state-machine';

export { FileArtifactStore, nodeFileSystem } from './storage/file-store';
export type { ArtifactFileSystem, ArtifactStore } from './storage/store';
export { ARTIFACT_DEFINITIONS } from './storage/artifact-schemas';

export { InvocationAdapter, DEFAULT_INVOCATION_CONFIG } from './invocation/adapter';
export type { InvocationConfig } from './invocation/adapter';
export { computeBackoff, DEFAULT_BACKOFF } from './invocation/backoff';
export { createLiveAdapter } from './invocation/live';
export * from './invocation/types';

export { ExecutionModeManager } from './mode/mode-manager';
export { MockStrategy, loadMockFixtures, DEFAULT_FIXTURES_DIR } from './mode/mock-strategy';

export * from './stages';
export * from './collectors';

export { loadSettings } from './config/settings';
export type { Settings } from './config/settings';
export { runCli } from './cli/program';
export { createLogger, logger, setLogHandler, setLogLevel, LogLevel } from './logger';
export type { Logger, LogEntry } from './logger';
