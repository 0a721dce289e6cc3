import type { ComponentId, ComponentToken } from '../core/token.js';
import type { StartupLogger } from '../logging/logger.js';

/**
 * Execution mode of an initializer.
 *
 *   - **Sync**: `create` runs to completion on the caller's stack
 *   - **Async**: `create` returns a Promise and may suspend
 *
 * @example
 * ```typescript
 * orchestrator.bulkInitialize([
 *   { token: ConfigC, kind: InitializerKind.Sync },
 *   { token: DatabaseC, kind: InitializerKind.Async },
 * ]);
 * ```
 */
export const InitializerKind = {
  Sync: 'sync',
  Async: 'async',
} as const;

export type InitializerKindType = (typeof InitializerKind)[keyof typeof InitializerKind];
export type InitializerKind = InitializerKindType;

/**
 * Produces one component synchronously.
 *
 * @template T - Value produced by `create`
 * @template C - Host context handed to `create`
 */
export interface SyncInitializer<T = unknown, C = unknown> {
  readonly kind: 'sync';
  /** Components that must be initialized first, resolved in this order. */
  dependencies(): readonly ComponentToken[];
  create(context: C): T;
}

/**
 * Produces one component asynchronously. `create` may suspend before
 * producing the value.
 */
export interface AsyncInitializer<T = unknown, C = unknown> {
  readonly kind: 'async';
  dependencies(): readonly ComponentToken[];
  create(context: C): Promise<T>;
}

export type Initializer<T = unknown, C = unknown> = SyncInitializer<T, C> | AsyncInitializer<T, C>;

/**
 * One entry of a bulk initialization batch, as supplied by discovery.
 */
export interface InitializerDescriptor {
  token: ComponentToken;
  kind: InitializerKind;
}

/**
 * Maps a component identity to a constructible initializer.
 * Implementations may throw; the orchestrator wraps the failure.
 */
export interface InitializerLookup<C = unknown> {
  lookup(token: ComponentToken): Initializer<unknown, C>;
}

/**
 * Produces the batch of components to initialize eagerly.
 */
export interface InitializerDiscovery {
  discover(): readonly InitializerDescriptor[];
}

/**
 * Called after every `create` with the component id and its duration.
 */
export type InitializeHook = (id: ComponentId, durationNs: number) => void;

export interface OrchestratorConfig<C = unknown> {
  /** Resolves identities to initializers (usually an InitializerRegistry). */
  lookup: InitializerLookup<C>;
  /** Host context passed to every `create`. */
  context: C;
  name?: string;
  logger?: StartupLogger;
  /**
   * Emit debug lines (discovered / initializing / initialized).
   * Defaults to `IGNITION_DEBUG=1` in the environment.
   */
  debug?: boolean;
  onInitialize?: InitializeHook;
  /** Fail launched jobs still running after this many milliseconds. */
  jobTimeoutMs?: number;
}
