/**
 * Branded type for component identifiers.
 * Prevents accidental use of raw strings as cache keys.
 */
export type ComponentId = string & { __brand: 'ComponentId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates a component token with the value its initializer produces.
 */
declare const COMPONENT_BRAND: unique symbol;

/**
 * Type-safe component identity.
 *
 * A token names one component type. Its `id` is the key used by the
 * orchestrator's resolution cache and by initializer registries, and the
 * phantom parameter T carries the type of the produced value.
 *
 * @template T - The type of value the component's initializer produces
 */
export interface ComponentToken<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'component';

  /** Unique identifier (cmp_1, cmp_2, etc.) */
  readonly id: ComponentId;

  /** Human-readable label for logs and error messages */
  readonly label: string;

  /** Phantom type brand - associates token with its value type */
  readonly [COMPONENT_BRAND]: T;
}

let _componentCounter = 0;

/**
 * Create a new component token.
 *
 * @param label - Optional human-readable label (defaults to "Component")
 *
 * @example
 * ```typescript
 * const DatabaseC = component<Database>('Database');
 * const MetricsC = component<MetricsClient>('Metrics');
 * ```
 */
export function component<T = unknown>(label?: string): ComponentToken<T> {
  const id = `cmp_${++_componentCounter}` as ComponentId;
  return Object.freeze({
    kind: 'component',
    id,
    label: label ?? 'Component',
  }) as ComponentToken<T>;
}

/**
 * Runtime type guard for component tokens.
 * Used for input validation in public APIs.
 */
export function isComponentToken(x: unknown): x is ComponentToken<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as ComponentToken).kind === 'component' &&
    typeof (x as ComponentToken).id === 'string' &&
    typeof (x as ComponentToken).label === 'string'
  );
}

/** Format a token for diagnostics: `Label [cmp_3]`. */
export function describeComponent(token: ComponentToken<unknown>): string {
  return `${token.label} [${token.id}]`;
}
