import {
  DuplicateInitializerError,
  InitializerNotFoundError,
  InvalidInitializerError,
  InvalidTokenError,
} from '../errors/errors.js';
import { describeComponent, isComponentToken, type ComponentId, type ComponentToken } from '../core/token.js';
import {
  InitializerKind,
  type Initializer,
  type InitializerDescriptor,
  type InitializerDiscovery,
  type InitializerLookup,
} from '../types/types.js';

export interface RegistrationOptions {
  /** Include the component in `discover()` batches. */
  eager?: boolean;
  /**
   * Kind reported by `discover()`. When omitted the factory is called once to
   * read the kind of the initializer it builds.
   */
  kind?: InitializerKind;
}

/**
 * Registered component.
 *
 * Fields:
 * - token: identity the initializer produces
 * - factory: builds a fresh initializer on every lookup
 * - eager / kind: discovery metadata from RegistrationOptions
 */
type RegistryRecord<C> = {
  token: ComponentToken;
  factory: () => Initializer<unknown, C>;
  eager: boolean;
  kind?: InitializerKind;
};

function isInitializer<C>(value: unknown): value is Initializer<unknown, C> {
  if (typeof value !== 'object' || value === null) return false;
  const candidate = value as Partial<Initializer>;
  return (
    (candidate.kind === InitializerKind.Sync || candidate.kind === InitializerKind.Async) &&
    typeof candidate.dependencies === 'function' &&
    typeof candidate.create === 'function'
  );
}

/**
 * Explicit registry mapping component identities to initializer factories.
 *
 * The host application fills it at startup and hands it to the orchestrator,
 * which uses it both as the `lookup` collaborator (identity -> initializer)
 * and, through `discover()`, as the source of the eager batch.
 *
 * Registration order is kept: `discover()` lists eager components in the order
 * they were registered.
 *
 * @example
 * ```typescript
 * const registry = new InitializerRegistry<AppContext>()
 *   .register(ConfigC, () => syncInitializer({ create: (ctx) => ctx.config }), { eager: true })
 *   .register(CacheC, () => asyncInitializer({ dependencies: [ConfigC], create: connectCache }));
 * ```
 */
export class InitializerRegistry<C = unknown> implements InitializerLookup<C>, InitializerDiscovery {
  private readonly records = new Map<ComponentId, RegistryRecord<C>>();

  get size(): number {
    return this.records.size;
  }

  /**
   * Register the initializer factory of a component.
   *
   * @throws {InvalidTokenError} If `token` is not a component token
   * @throws {InvalidInitializerError} If `factory` is not a function
   * @throws {DuplicateInitializerError} If the component is already registered
   */
  register<T>(
    token: ComponentToken<T>,
    factory: () => Initializer<T, C>,
    options: RegistrationOptions = {}
  ): this {
    if (!isComponentToken(token)) throw new InvalidTokenError(token);
    if (typeof factory !== 'function') {
      throw new InvalidInitializerError(describeComponent(token), factory);
    }
    if (this.records.has(token.id)) throw new DuplicateInitializerError(describeComponent(token));

    this.records.set(token.id, {
      token,
      factory,
      eager: options.eager ?? false,
      kind: options.kind,
    });
    return this;
  }

  has(token: ComponentToken): boolean {
    return this.records.has(token.id);
  }

  /** Registered tokens, in registration order. */
  tokens(): ComponentToken[] {
    return Array.from(this.records.values(), (record) => record.token);
  }

  /**
   * Build the initializer of `token`.
   *
   * @throws {InitializerNotFoundError} If nothing is registered for `token`
   * @throws {InvalidInitializerError} If the factory returns something else
   */
  lookup(token: ComponentToken): Initializer<unknown, C> {
    const record = this.records.get(token.id);
    if (!record) {
      throw new InitializerNotFoundError(
        describeComponent(token),
        this.tokens().map((t) => describeComponent(t))
      );
    }
    return this.build(record);
  }

  /** Eager components as `{ token, kind }`, in registration order. */
  discover(): InitializerDescriptor[] {
    const batch: InitializerDescriptor[] = [];
    for (const record of this.records.values()) {
      if (!record.eager) continue;
      batch.push({ token: record.token, kind: record.kind ?? this.build(record).kind });
    }
    return batch;
  }

  private build(record: RegistryRecord<C>): Initializer<unknown, C> {
    const initializer: unknown = record.factory();
    if (!isInitializer<C>(initializer)) {
      throw new InvalidInitializerError(describeComponent(record.token), initializer);
    }
    return initializer;
  }
}
