/* ResolverSync
 *
 * Synchronous resolution helper used by StartupOrchestrator. Responsibilities:
 *  - Return cached components without touching their initializers.
 *  - Detect cycles using the caller's `stack` and throw `CycleDetectedError`
 *    with the path that closed the cycle.
 *  - Resolve dependencies depth-first, in declared order, before `create`.
 *  - Commit the value to the shared cache only after `create` returned, so a
 *    failure leaves nothing behind and a later call retries.
 *
 * Notes:
 *  - Lookup and creation (and their error wrapping) live in `Activator`.
 *  - A component whose async construction is in flight cannot be waited for
 *    here; the call fails with `ConstructionInProgressError` instead of
 *    creating it a second time.
 */

import {
  ConstructionInProgressError,
  CycleDetectedError,
  InitializationFailedError,
} from '../errors/errors.js';
import type { Activator } from './activator.js';
import type { StartupOrchestrator } from './orchestrator.js';
import type { ComponentId, ComponentToken } from './token.js';

export class ResolverSync<C> {
  constructor(
    private readonly orchestrator: StartupOrchestrator<C>,
    private readonly activator: Activator<C>
  ) {}

  /**
   * Resolve a component synchronously.
   *
   * @param token - Component to resolve
   * @param stack - Active resolution chain (mutated during traversal)
   */
  resolve(token: ComponentToken, stack: ComponentId[]): unknown {
    const id = token.id;
    const cache = this.orchestrator.cache;
    if (cache.has(id)) return cache.get(id);

    if (stack.includes(id)) {
      const cycle = stack.slice(stack.indexOf(id)).concat(id);
      throw new CycleDetectedError(
        this.orchestrator.describe(id),
        cycle.map((c) => this.orchestrator.describe(c))
      );
    }

    if (cache.inFlight(id)) {
      const label = this.orchestrator.describe(id);
      throw new InitializationFailedError(label, new ConstructionInProgressError(label));
    }

    stack.push(id);
    try {
      const { initializer, dependencies } = this.activator.lookup(token);

      for (const dep of dependencies) {
        if (!cache.has(dep.id)) this.resolve(dep, stack);
      }

      this.orchestrator.logDebug(`Initializing ${this.orchestrator.describe(id)}`);
      const value = this.activator.instantiateSync(id, initializer);
      cache.commit(id, value);
      this.orchestrator.logDebug(`Initialized ${this.orchestrator.describe(id)}`);
      return value;
    } finally {
      stack.pop();
    }
  }
}
