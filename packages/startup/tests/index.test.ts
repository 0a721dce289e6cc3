import { describe, expect, it } from 'vitest';

import {
  AsyncLock,
  bootstrap,
  component,
  createComponentGroup,
  InitializerKind,
  InitializerRegistry,
  JobEngine,
  StartupError,
  StartupOrchestrator,
  syncInitializer,
} from '../src/index.js';
import { bootstrap as bootstrapImpl } from '../src/api/bootstrap.js';
import { StartupOrchestrator as OrchestratorImpl } from '../src/core/orchestrator.js';
import { InitializerRegistry as RegistryImpl } from '../src/registry/initializer-registry.js';

describe('package public index', () => {
  it('re-exports the public api surface', () => {
    expect(bootstrap).toBe(bootstrapImpl);
    expect(StartupOrchestrator).toBe(OrchestratorImpl);
    expect(InitializerRegistry).toBe(RegistryImpl);
    expect(InitializerKind).toEqual({ Sync: 'sync', Async: 'async' });
    expect(typeof AsyncLock).toBe('function');
    expect(typeof JobEngine).toBe('function');
    expect(typeof StartupError).toBe('function');
    expect(typeof createComponentGroup).toBe('function');
  });

  it('supports the documented startup flow', async () => {
    const Greeting = component<string>('Greeting');
    const registry = new InitializerRegistry().register(
      Greeting,
      () => syncInitializer({ create: () => 'hello' }),
      { eager: true }
    );

    const orchestrator = bootstrap({
      registry,
      context: undefined,
      logger: { debug: () => undefined, warn: () => undefined, error: () => undefined },
    });

    await orchestrator.awaitAll();
    expect(orchestrator.resolveSync(Greeting)).toBe('hello');
  });
});
