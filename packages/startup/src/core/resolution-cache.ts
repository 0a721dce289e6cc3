/*
 * ResolutionCache
 * ---------------
 * Memoization store shared by the sync and async resolvers of one orchestrator:
 *  - component id -> produced value (write-once)
 *  - component id -> promise of an async construction still in flight
 *  - wait edges: component id -> ids whose construction it is awaiting
 *
 * Presence is tracked by the map itself, not by the value, so initializers
 * that produce `undefined` are cached like any other.
 */
import type { ComponentId } from './token.js';

export class ResolutionCache {
  private readonly values = new Map<ComponentId, unknown>();
  private readonly pending = new Map<ComponentId, Promise<unknown>>();
  private readonly waits = new Map<ComponentId, ComponentId[]>();

  get size(): number {
    return this.values.size;
  }

  has(id: ComponentId): boolean {
    return this.values.has(id);
  }

  get(id: ComponentId): unknown {
    return this.values.get(id);
  }

  /**
   * Store the value produced for `id`.
   *
   * @throws Error if a value is already stored; resolvers check `has()` first.
   */
  commit(id: ComponentId, value: unknown): void {
    if (this.values.has(id)) {
      throw new Error(`Component '${id}' is already initialized.`);
    }
    this.values.set(id, value);
  }

  /** In-flight async construction of `id`, if any. */
  inFlight(id: ComponentId): Promise<unknown> | undefined {
    return this.pending.get(id);
  }

  markInFlight(id: ComponentId, construction: Promise<unknown>): void {
    this.pending.set(id, construction);
  }

  clearInFlight(id: ComponentId): void {
    this.pending.delete(id);
  }

  /** Record that the construction of `from` is suspended until `to` settles. */
  addWait(from: ComponentId, to: ComponentId): void {
    const targets = this.waits.get(from);
    if (targets) targets.push(to);
    else this.waits.set(from, [to]);
  }

  removeWait(from: ComponentId, to: ComponentId): void {
    const targets = this.waits.get(from);
    if (!targets) return;
    const index = targets.indexOf(to);
    if (index !== -1) targets.splice(index, 1);
    if (targets.length === 0) this.waits.delete(from);
  }

  /**
   * Chain of wait edges leading from `from` to `to`, both included, or
   * undefined when `from` does not (transitively) wait on `to`.
   */
  waitPath(from: ComponentId, to: ComponentId): ComponentId[] | undefined {
    const visited = new Set<ComponentId>();
    const walk = (current: ComponentId): ComponentId[] | undefined => {
      if (current === to) return [current];
      if (visited.has(current)) return undefined;
      visited.add(current);
      for (const next of this.waits.get(current) ?? []) {
        const rest = walk(next);
        if (rest) return [current, ...rest];
      }
      return undefined;
    };
    return walk(from);
  }

  snapshot(): Map<ComponentId, unknown> {
    return new Map(this.values);
  }
}
