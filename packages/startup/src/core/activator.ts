/* Activator
 *
 * Turns a component id into a value. It owns the two steps of the resolution
 * algorithm that call into host code:
 *  - lookup: identity -> initializer, through the configured InitializerLookup
 *  - create: initializer -> value, sync or async, with instrumentation
 *
 * Every failure raised by host code in those steps is logged and wrapped in
 * `InitializationFailedError`, so resolvers only see orchestrator errors.
 * Failures of the `onInitialize` hook are only logged.
 * Dependency resolution and caching stay in the resolvers.
 */

import {
  AsyncInitializerInSyncPathError,
  InitializationFailedError,
  ThenableInSyncPathError,
} from '../errors/errors.js';
import type { InitializeHook, Initializer } from '../types/types.js';
import type { StartupOrchestrator } from './orchestrator.js';
import type { ComponentId, ComponentToken } from './token.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

const toNs = (ms: number) => Math.round(ms * 1_000_000);

const isThenable = (value: unknown): value is PromiseLike<unknown> =>
  (typeof value === 'object' || typeof value === 'function') &&
  value !== null &&
  typeof (value as PromiseLike<unknown>).then === 'function';

export class Activator<C> {
  constructor(private readonly orchestrator: StartupOrchestrator<C>) {}

  /**
   * Obtain the initializer for `token` and read its dependency list.
   *
   * @throws {InitializationFailedError} when the lookup or `dependencies()` throws
   */
  lookup(token: ComponentToken): {
    initializer: Initializer<unknown, C>;
    dependencies: readonly ComponentToken[];
  } {
    try {
      const initializer = this.orchestrator.getLookup().lookup(token);
      const dependencies = initializer.dependencies();
      dependencies.forEach((dep) => this.orchestrator.rememberToken(dep));
      return { initializer, dependencies };
    } catch (e) {
      throw this.fail(token.id, e);
    }
  }

  /**
   * Synchronous creation.
   *
   * Behavior contract
   *  - Async initializers are rejected: they need resolveAsync().
   *  - A sync `create` returning a thenable is rejected; the value would be a
   *    pending promise instead of the component.
   *  - Everything thrown is wrapped in `InitializationFailedError`.
   */
  instantiateSync(id: ComponentId, initializer: Initializer<unknown, C>): unknown {
    const label = this.orchestrator.describe(id);
    try {
      if (initializer.kind === 'async') throw new AsyncInitializerInSyncPathError(label);

      return this.instrumentSync(id, () => {
        const value = initializer.create(this.orchestrator.getContext());
        if (isThenable(value)) throw new ThenableInSyncPathError(label);
        return value;
      });
    } catch (e) {
      throw this.fail(id, e);
    }
  }

  /**
   * Asynchronous creation. Sync initializers are accepted and run inline.
   */
  async instantiateAsync(id: ComponentId, initializer: Initializer<unknown, C>): Promise<unknown> {
    if (initializer.kind === 'sync') return this.instantiateSync(id, initializer);

    const asyncInitializer = initializer;
    try {
      return await this.instrumentAsync(id, () =>
        asyncInitializer.create(this.orchestrator.getContext())
      );
    } catch (e) {
      throw this.fail(id, e);
    }
  }

  /** Log a failed lookup or creation and wrap it for the caller. */
  private fail(id: ComponentId, cause: unknown): InitializationFailedError {
    const label = this.orchestrator.describe(id);
    this.orchestrator.logError(`Error initializing ${label}`, cause);
    return new InitializationFailedError(label, cause);
  }

  private instrumentSync<T>(id: ComponentId, execute: () => T): T {
    const hook = this.orchestrator.getInitializeHook();
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      this.report(hook, id, start);
    }
  }

  private async instrumentAsync<T>(id: ComponentId, execute: () => Promise<T>): Promise<T> {
    const hook = this.orchestrator.getInitializeHook();
    if (!hook) return await execute();

    const start = nowMs();
    try {
      return await execute();
    } finally {
      this.report(hook, id, start);
    }
  }

  /**
   * Call the initialize hook. A throwing hook is logged and never fails the
   * creation it measured, so the value is still cached.
   */
  private report(hook: InitializeHook, id: ComponentId, start: number): void {
    try {
      hook(id, toNs(nowMs() - start));
    } catch (e) {
      const label = this.orchestrator.describe(id);
      this.orchestrator.logError(`onInitialize hook failed for ${label}`, e);
    }
  }
}
