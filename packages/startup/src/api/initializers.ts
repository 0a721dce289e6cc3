import type { ComponentToken } from '../core/token.js';
import type { AsyncInitializer, SyncInitializer } from '../types/types.js';

const EMPTY_DEPENDENCIES: readonly ComponentToken[] = Object.freeze([]);

export interface SyncInitializerOptions<T, C> {
  dependencies?: readonly ComponentToken[];
  create: (context: C) => T;
}

export interface AsyncInitializerOptions<T, C> {
  dependencies?: readonly ComponentToken[];
  create: (context: C) => Promise<T>;
}

/**
 * Build a synchronous initializer from a create function.
 *
 * @example
 * ```typescript
 * registry.register(ConfigC, () =>
 *   syncInitializer({ create: (ctx) => loadConfig(ctx.env) })
 * );
 * ```
 */
export function syncInitializer<T, C = unknown>(
  options: SyncInitializerOptions<T, C>
): SyncInitializer<T, C> {
  const dependencies = options.dependencies ?? EMPTY_DEPENDENCIES;
  return {
    kind: 'sync',
    dependencies: () => dependencies,
    create: options.create,
  };
}

/**
 * Build an asynchronous initializer from a create function.
 *
 * @example
 * ```typescript
 * registry.register(DatabaseC, () =>
 *   asyncInitializer({
 *     dependencies: [ConfigC],
 *     create: async (ctx) => connect(ctx.databaseUrl),
 *   })
 * );
 * ```
 */
export function asyncInitializer<T, C = unknown>(
  options: AsyncInitializerOptions<T, C>
): AsyncInitializer<T, C> {
  const dependencies = options.dependencies ?? EMPTY_DEPENDENCIES;
  return {
    kind: 'async',
    dependencies: () => dependencies,
    create: options.create,
  };
}
