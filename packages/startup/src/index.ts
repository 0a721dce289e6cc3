export { bootstrap } from './api/bootstrap.js';
export type { BootstrapOptions, OrchestratorFactory } from './api/bootstrap.js';
export { createComponentGroup } from './api/component-group.js';
export { asyncInitializer, syncInitializer } from './api/initializers.js';
export type { AsyncInitializerOptions, SyncInitializerOptions } from './api/initializers.js';

export { InitializerRegistry } from './registry/initializer-registry.js';
export type { RegistrationOptions } from './registry/initializer-registry.js';

export { InitializerKind } from './types/types.js';
export type {
  AsyncInitializer,
  InitializeHook,
  Initializer,
  InitializerDescriptor,
  InitializerDiscovery,
  InitializerLookup,
  OrchestratorConfig,
  SyncInitializer,
} from './types/types.js';

export * from './core/token.js';

export { StartupOrchestrator } from './core/orchestrator.js';
export { AsyncLock } from './core/async-lock.js';
export { JobEngine } from './engine/job-engine.js';
export type { JobEngineOptions, JobRecord, JobState } from './engine/job-engine.js';

export { createConsoleLogger, DEFAULT_LOG_PREFIX } from './logging/logger.js';
export type { ConsoleLoggerOptions, StartupLogger } from './logging/logger.js';

// Errors
export {
  AsyncInitializerInSyncPathError,
  AwaitAllFailedError,
  ConstructionInProgressError,
  CycleDetectedError,
  DiscoveryFailedError,
  DuplicateInitializerError,
  InitializationFailedError,
  InitializerNotFoundError,
  InvalidDescriptorError,
  InvalidInitializerError,
  InvalidOrchestratorConfigError,
  InvalidTokenError,
  JobTimeoutError,
  StartupError,
  ThenableInSyncPathError,
} from './errors/errors.js';
