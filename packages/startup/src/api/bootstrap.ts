import { StartupOrchestrator } from '../core/orchestrator.js';
import type { InitializerDiscovery, InitializerLookup, OrchestratorConfig } from '../types/types.js';

/**
 * Builds the orchestrator used by `bootstrap()`. Tests pass their own to
 * observe or wrap the instance; applications normally leave it out.
 */
export type OrchestratorFactory<C> = (config: OrchestratorConfig<C>) => StartupOrchestrator<C>;

export interface BootstrapOptions<C> extends Omit<OrchestratorConfig<C>, 'lookup'> {
  /** Lookup collaborator; also the discovery source unless `discovery` is set. */
  registry: InitializerLookup<C> & InitializerDiscovery;
  discovery?: InitializerDiscovery;
  factory?: OrchestratorFactory<C>;
}

const defaultFactory = <C>(config: OrchestratorConfig<C>): StartupOrchestrator<C> =>
  new StartupOrchestrator(config);

/**
 * Create an orchestrator and eagerly initialize the discovered batch.
 *
 * Sync components of the batch are ready when this returns; async ones are
 * running as jobs. Await `orchestrator.awaitAll()` (or use
 * `onStartupComplete`) to know when they are done.
 *
 * @example
 * ```typescript
 * const orchestrator = bootstrap({ registry, context: { env: process.env } });
 * await orchestrator.onStartupComplete(() => logger.info('startup complete'));
 * ```
 */
export function bootstrap<C>(options: BootstrapOptions<C>): StartupOrchestrator<C> {
  const { registry, discovery, factory, ...config } = options;
  const create: OrchestratorFactory<C> = factory ?? defaultFactory;
  const orchestrator = create({ ...config, lookup: registry });
  orchestrator.discoverAndInitialize(discovery ?? registry);
  return orchestrator;
}
