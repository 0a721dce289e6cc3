/* ResolverAsync
 *
 * Asynchronous resolution helper used by StartupOrchestrator. Same algorithm
 * as `ResolverSync`, with suspension allowed inside async `create` calls:
 *  - Cached components return immediately.
 *  - `CycleDetectedError` when the caller's `stack` already holds the id.
 *  - Dependencies are resolved one after another in declared order, never in
 *    parallel, and the whole subtree is done before `create` runs.
 *  - Every construction is registered in the cache's in-flight map while it
 *    runs. A second resolution reaching the same id awaits that construction
 *    instead of starting another one.
 *
 * Notes:
 *  - Top-level calls are serialized by the orchestrator's AsyncLock; the
 *    in-flight map covers nested calls made from inside a running `create`.
 *  - Concurrent nested calls each carry their own copy of the stack, so a
 *    cycle split across them is invisible to the stack check. Every await on
 *    a construction is recorded as a wait edge in the cache; awaiting a
 *    construction that already waits on the caller fails with
 *    `CycleDetectedError` instead of suspending both sides forever.
 *  - On failure the in-flight entry is dropped and nothing is cached, so the
 *    next resolution retries.
 */

import { CycleDetectedError } from '../errors/errors.js';
import type { Activator } from './activator.js';
import type { StartupOrchestrator } from './orchestrator.js';
import type { ComponentId, ComponentToken } from './token.js';

export class ResolverAsync<C> {
  constructor(
    private readonly orchestrator: StartupOrchestrator<C>,
    private readonly activator: Activator<C>
  ) {}

  /**
   * Resolve a component asynchronously.
   *
   * @param token - Component to resolve
   * @param stack - Active resolution chain (mutated during traversal)
   */
  async resolve(token: ComponentToken, stack: ComponentId[]): Promise<unknown> {
    const id = token.id;
    const cache = this.orchestrator.cache;
    if (cache.has(id)) return cache.get(id);

    if (stack.includes(id)) {
      const cycle = stack.slice(stack.indexOf(id)).concat(id);
      throw this.cycleError(id, cycle);
    }

    // The component whose construction suspends until `id` is ready.
    const requester = stack.at(-1);

    const inFlight = cache.inFlight(id);
    if (inFlight) {
      const path = requester === undefined ? undefined : cache.waitPath(id, requester);
      if (path) throw this.cycleError(id, path.concat(id));
      return await this.waitFor(requester, id, inFlight);
    }

    stack.push(id);
    const construction = Promise.resolve().then(() => this.construct(token, stack));
    cache.markInFlight(id, construction);
    try {
      return await this.waitFor(requester, id, construction);
    } finally {
      cache.clearInFlight(id);
      stack.pop();
    }
  }

  private async construct(token: ComponentToken, stack: ComponentId[]): Promise<unknown> {
    const id = token.id;
    const cache = this.orchestrator.cache;
    const { initializer, dependencies } = this.activator.lookup(token);

    for (const dep of dependencies) {
      if (!cache.has(dep.id)) await this.resolve(dep, stack);
    }

    this.orchestrator.logDebug(`Initializing ${this.orchestrator.describe(id)}`);
    const value = await this.activator.instantiateAsync(id, initializer);
    cache.commit(id, value);
    this.orchestrator.logDebug(`Initialized ${this.orchestrator.describe(id)}`);
    return value;
  }

  private async waitFor(
    requester: ComponentId | undefined,
    id: ComponentId,
    construction: Promise<unknown>
  ): Promise<unknown> {
    if (requester === undefined) return await construction;

    const cache = this.orchestrator.cache;
    cache.addWait(requester, id);
    try {
      return await construction;
    } finally {
      cache.removeWait(requester, id);
    }
  }

  private cycleError(id: ComponentId, cycle: ComponentId[]): CycleDetectedError {
    return new CycleDetectedError(
      this.orchestrator.describe(id),
      cycle.map((c) => this.orchestrator.describe(c))
    );
  }
}
