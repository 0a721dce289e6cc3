import { AsyncLocalStorage } from 'node:async_hooks';

import {
  DiscoveryFailedError,
  InvalidDescriptorError,
  InvalidOrchestratorConfigError,
  InvalidTokenError,
} from '../errors/errors.js';
import { JobEngine, type JobRecord } from '../engine/job-engine.js';
import { createConsoleLogger, isDebugFromEnv, type StartupLogger } from '../logging/logger.js';
import {
  InitializerKind,
  type InitializeHook,
  type InitializerDescriptor,
  type InitializerDiscovery,
  type InitializerLookup,
  type OrchestratorConfig,
} from '../types/types.js';
import { Activator } from './activator.js';
import { AsyncLock } from './async-lock.js';
import { ResolutionCache } from './resolution-cache.js';
import { ResolverAsync } from './resolver-async.js';
import { ResolverSync } from './resolver-sync.js';
import { isComponentToken, type ComponentId, type ComponentToken } from './token.js';

/**
 * Resolution chain of one async resolution, visible to every `create`
 * running inside it. `active` turns false once the resolution ends so
 * stray continuations started by a `create` do not join a finished chain.
 */
interface ResolutionFrame {
  readonly stack: ComponentId[];
  active: boolean;
}

function assertValidToken(token: unknown): asserts token is ComponentToken {
  if (!isComponentToken(token)) throw new InvalidTokenError(token);
}

function isDescriptor(value: unknown): value is InitializerDescriptor {
  if (typeof value !== 'object' || value === null) return false;
  const { token, kind } = value as Partial<InitializerDescriptor>;
  return isComponentToken(token) && (kind === InitializerKind.Sync || kind === InitializerKind.Async);
}

/*
 * StartupOrchestrator: memoized, cycle-safe component initialization.
 *
 * Components are produced once per orchestrator, in dependency order, either
 * on the caller's stack (`resolveSync`) or asynchronously (`resolveAsync`,
 * `launchAsync`). Launched resolutions are tracked by a JobEngine whose
 * barrier (`awaitAll`) tells the host when startup is complete.
 *
 * Mutual exclusion: synchronous resolutions cannot interleave with anything on
 * a single thread, so they only track the active chain for re-entrant calls.
 * Top-level async resolutions hold an AsyncLock until their whole dependency
 * subtree is built; calls made from inside a running `create` join the chain
 * that holds the lock.
 */
export class StartupOrchestrator<C = unknown> {
  /** @internal Shared by both resolvers. */
  readonly cache = new ResolutionCache();
  readonly jobs: JobEngine;

  private readonly activator: Activator<C>;
  private readonly resolverSync: ResolverSync<C>;
  private readonly resolverAsync: ResolverAsync<C>;
  private readonly lock = new AsyncLock();
  private readonly frames = new AsyncLocalStorage<ResolutionFrame>();
  private syncStack: ComponentId[] | undefined;

  private readonly labels = new Map<ComponentId, string>();
  private readonly syncDiscovered = new Set<ComponentId>();
  private readonly asyncDiscovered = new Set<ComponentId>();

  private readonly name: string;
  private readonly lookup: InitializerLookup<C>;
  private readonly context: C;
  private readonly logger: StartupLogger;
  private readonly debugEnabled: boolean;
  private readonly initializeHook?: InitializeHook;

  constructor(config: OrchestratorConfig<C>) {
    validateConfig(config);

    this.name = config.name ?? 'StartupOrchestrator';
    this.lookup = config.lookup;
    this.context = config.context;
    this.debugEnabled = config.debug ?? isDebugFromEnv();
    this.logger = config.logger ?? createConsoleLogger({ debug: true });
    this.initializeHook = config.onInitialize;

    this.jobs = new JobEngine({ timeoutMs: config.jobTimeoutMs });
    this.activator = new Activator(this);
    this.resolverSync = new ResolverSync(this, this.activator);
    this.resolverAsync = new ResolverAsync(this, this.activator);
  }

  getName(): string {
    return this.name;
  }

  /**
   * Resolve a component and its dependency closure synchronously.
   *
   * @throws {InvalidTokenError} If `token` is not a component token
   * @throws {CycleDetectedError} If the dependency chain revisits a component
   * @throws {InitializationFailedError} If a lookup or `create` fails, or a
   *   component in the closure is async
   *
   * @example
   * ```typescript
   * const config = orchestrator.resolveSync(ConfigC);
   * ```
   */
  resolveSync<T>(token: ComponentToken<T>): T {
    assertValidToken(token);
    this.rememberToken(token);
    const id = token.id;
    if (this.cache.has(id)) return this.cache.get(id) as T;

    // Re-entrant call from a create(): continue the active chain.
    const active = this.syncStack ?? this.activeFrame()?.stack;
    if (active) return this.resolverSync.resolve(token, active) as T;

    const stack: ComponentId[] = [];
    this.syncStack = stack;
    try {
      return this.resolverSync.resolve(token, stack) as T;
    } finally {
      this.syncStack = undefined;
    }
  }

  /**
   * Resolve a component and its dependency closure asynchronously.
   *
   * Top-level calls wait for the orchestrator's async lock; calls made from
   * inside a running `create` join that resolution instead.
   *
   * @throws {InvalidTokenError} If `token` is not a component token
   * @throws {CycleDetectedError} If the dependency chain revisits a component
   * @throws {InitializationFailedError} If a lookup or `create` fails
   */
  async resolveAsync<T>(token: ComponentToken<T>): Promise<T> {
    assertValidToken(token);
    this.rememberToken(token);
    const id = token.id;
    if (this.cache.has(id)) return this.cache.get(id) as T;

    const parent = this.activeFrame();
    if (parent) return (await this.resolveInFrame(token, parent.stack.slice())) as T;

    const value = await this.lock.runExclusive(() => this.resolveInFrame(token, []));
    return value as T;
  }

  /**
   * Resolve a component in the background, tracked by the job engine.
   *
   * @returns The job's record; the produced value is only reachable through
   *   the cache once the job succeeded
   */
  launchAsync(token: ComponentToken): JobRecord {
    assertValidToken(token);
    this.rememberToken(token);
    // Launched jobs never inherit the caller's resolution chain.
    return this.frames.exit(() =>
      this.jobs.launch(() => this.resolveAsync(token), this.describe(token.id))
    );
  }

  /**
   * Eagerly initialize a discovered batch: every sync entry is resolved in
   * order on the caller's stack, then every async entry is launched.
   *
   * @returns Records of the launched async jobs
   * @throws {InvalidDescriptorError} If an entry is not `{ token, kind }`
   */
  bulkInitialize(descriptors: readonly InitializerDescriptor[]): JobRecord[] {
    for (const descriptor of descriptors) {
      if (!isDescriptor(descriptor)) throw new InvalidDescriptorError(descriptor);
    }

    for (const { token, kind } of descriptors) {
      this.rememberToken(token);
      const discovered = kind === InitializerKind.Sync ? this.syncDiscovered : this.asyncDiscovered;
      discovered.add(token.id);
      this.logDebug(`Discovered ${this.describe(token.id)}`);
    }

    for (const { token, kind } of descriptors) {
      if (kind === InitializerKind.Sync) this.resolveSync(token);
    }

    const launched: JobRecord[] = [];
    for (const { token, kind } of descriptors) {
      if (kind === InitializerKind.Async) launched.push(this.launchAsync(token));
    }
    return launched;
  }

  /**
   * Ask `discovery` for a batch and run it through `bulkInitialize`.
   *
   * @throws {DiscoveryFailedError} If `discover()` throws; nothing is initialized
   */
  discoverAndInitialize(discovery: InitializerDiscovery): JobRecord[] {
    let batch: readonly InitializerDescriptor[];
    try {
      batch = discovery.discover();
    } catch (e) {
      throw new DiscoveryFailedError(e);
    }
    return this.bulkInitialize(batch);
  }

  /**
   * Whether `token` was part of a bulk initialization batch, optionally of the
   * given kind. Says nothing about whether its construction finished.
   */
  isEagerlyInitialized(token: ComponentToken, kind?: InitializerKind): boolean {
    assertValidToken(token);
    if (kind === InitializerKind.Sync) return this.syncDiscovered.has(token.id);
    if (kind === InitializerKind.Async) return this.asyncDiscovered.has(token.id);
    return this.syncDiscovered.has(token.id) || this.asyncDiscovered.has(token.id);
  }

  /**
   * Wait until every launched job is terminal.
   *
   * @throws {AwaitAllFailedError} carrying the first job failure
   */
  async awaitAll(): Promise<void> {
    this.logDebug('Awaiting all start jobs ...');
    await this.jobs.awaitAll();
  }

  isAllDone(): boolean {
    return this.jobs.isAllDone();
  }

  /**
   * Run `callback` once every launched job has finished.
   *
   * @example
   * ```typescript
   * await orchestrator.onStartupComplete(() => server.listen(port));
   * ```
   */
  async onStartupComplete(
    callback: (orchestrator: StartupOrchestrator<C>) => void | Promise<void>
  ): Promise<void> {
    await this.awaitAll();
    await callback(this);
  }

  isInitialized(token: ComponentToken): boolean {
    assertValidToken(token);
    return this.cache.has(token.id);
  }

  /** Snapshot of every initialized component, keyed by id. */
  getInitialized(): Map<ComponentId, unknown> {
    return this.cache.snapshot();
  }

  /** @internal */
  getLookup(): InitializerLookup<C> {
    return this.lookup;
  }

  /** @internal */
  getContext(): C {
    return this.context;
  }

  /** @internal */
  getInitializeHook(): InitializeHook | undefined {
    return this.initializeHook;
  }

  /** @internal Keep the label of every token seen, for diagnostics. */
  rememberToken(token: ComponentToken): void {
    if (!this.labels.has(token.id)) this.labels.set(token.id, token.label);
  }

  /** @internal */
  describe(id: ComponentId): string {
    const label = this.labels.get(id);
    return label === undefined ? id : `${label} [${id}]`;
  }

  /** @internal */
  logDebug(message: string): void {
    if (this.debugEnabled) this.logger.debug(message);
  }

  /** @internal */
  logError(message: string, error: unknown): void {
    this.logger.error(message, error);
  }

  /**
   * Run one async resolution inside its own frame so `create` calls made
   * during it can find the chain they belong to.
   */
  private resolveInFrame(token: ComponentToken, stack: ComponentId[]): Promise<unknown> {
    const frame: ResolutionFrame = { stack, active: true };
    return this.frames.run(frame, async () => {
      try {
        return await this.resolverAsync.resolve(token, frame.stack);
      } finally {
        frame.active = false;
      }
    });
  }

  private activeFrame(): ResolutionFrame | undefined {
    const frame = this.frames.getStore();
    return frame?.active ? frame : undefined;
  }
}

function validateConfig<C>(config: OrchestratorConfig<C>): void {
  if (typeof config !== 'object' || config === null) {
    throw new InvalidOrchestratorConfigError('config must be an object');
  }
  const { lookup, jobTimeoutMs, onInitialize, logger } = config;
  if (typeof lookup !== 'object' || lookup === null || typeof lookup.lookup !== 'function') {
    throw new InvalidOrchestratorConfigError("'lookup' must expose a lookup(token) function");
  }
  if (jobTimeoutMs !== undefined && !(Number.isFinite(jobTimeoutMs) && jobTimeoutMs > 0)) {
    throw new InvalidOrchestratorConfigError("'jobTimeoutMs' must be a positive number");
  }
  if (onInitialize !== undefined && typeof onInitialize !== 'function') {
    throw new InvalidOrchestratorConfigError("'onInitialize' must be a function");
  }
  if (
    logger !== undefined &&
    (typeof logger.debug !== 'function' ||
      typeof logger.warn !== 'function' ||
      typeof logger.error !== 'function')
  ) {
    throw new InvalidOrchestratorConfigError("'logger' must implement debug, warn and error");
  }
}
