import { component, type ComponentToken } from '../core/token.js';

/**
 * Create several component tokens at once with a shared label prefix.
 * Useful for declaring the components of one feature together.
 *
 * @param prefix - Common label prefix (e.g., 'Billing', 'Search')
 * @param shape - Keys become token names; values only carry the value type
 * @returns Object with the same keys and one ComponentToken per key
 *
 * @example
 * ```typescript
 * const Billing = createComponentGroup('Billing', {
 *   Client: null as unknown as BillingClient,
 *   Worker: null as unknown as BillingWorker,
 * });
 * // Billing.Client: ComponentToken<BillingClient>, label 'BillingClient'
 * ```
 */
export function createComponentGroup<T extends Record<string, unknown>>(
  prefix: string,
  shape: T
): { [K in keyof T]: ComponentToken<T[K]> } {
  const result = {} as { [K in keyof T]: ComponentToken<T[K]> };

  (Object.keys(shape) as Array<keyof T>).forEach((key) => {
    result[key] = component<T[typeof key]>(`${prefix}${String(key)}`);
  });

  return result;
}
