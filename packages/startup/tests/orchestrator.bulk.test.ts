import { describe, expect, it, vi } from 'vitest';

import { asyncInitializer, syncInitializer } from '../src/api/initializers.js';
import { StartupOrchestrator } from '../src/core/orchestrator.js';
import { component, describeComponent } from '../src/core/token.js';
import {
  AwaitAllFailedError,
  DiscoveryFailedError,
  InitializationFailedError,
  InvalidDescriptorError,
} from '../src/errors/errors.js';
import { InitializerRegistry } from '../src/registry/initializer-registry.js';
import { InitializerKind } from '../src/types/types.js';
import { captureError, deferred, silentLogger } from './helpers.js';

describe('StartupOrchestrator bulk initialization', () => {
  it('launches async entries and initializes shared dependencies once', async () => {
    const X = component<string>('X');
    const Y = component<string>('Y');
    const created: string[] = [];
    const registry = new InitializerRegistry()
      .register(X, () =>
        asyncInitializer({
          create: async () => {
            created.push('X');
            return 'x';
          },
        })
      )
      .register(Y, () =>
        asyncInitializer({
          dependencies: [X],
          create: async () => {
            created.push('Y');
            return 'y';
          },
        })
      );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    const jobs = orchestrator.bulkInitialize([
      { token: X, kind: InitializerKind.Async },
      { token: Y, kind: InitializerKind.Async },
    ]);

    expect(jobs.map((job) => job.label)).toEqual([describeComponent(X), describeComponent(Y)]);
    expect(orchestrator.isEagerlyInitialized(X)).toBe(true);
    expect(orchestrator.isEagerlyInitialized(X, InitializerKind.Async)).toBe(true);
    expect(orchestrator.isEagerlyInitialized(X, InitializerKind.Sync)).toBe(false);

    await orchestrator.awaitAll();

    expect(created).toEqual(['X', 'Y']);
    expect(orchestrator.isInitialized(X)).toBe(true);
    expect(orchestrator.isInitialized(Y)).toBe(true);
    expect(orchestrator.isAllDone()).toBe(true);
  });

  it('initializes sync entries before returning and async entries later', async () => {
    const Settings = component<string>('Settings');
    const Telemetry = component<string>('Telemetry');
    const registry = new InitializerRegistry()
      .register(Settings, () => syncInitializer({ create: () => 'settings' }))
      .register(Telemetry, () =>
        asyncInitializer({ dependencies: [Settings], create: async () => 'telemetry' })
      );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    orchestrator.bulkInitialize([
      { token: Telemetry, kind: InitializerKind.Async },
      { token: Settings, kind: InitializerKind.Sync },
    ]);

    expect(orchestrator.isInitialized(Settings)).toBe(true);
    expect(orchestrator.isInitialized(Telemetry)).toBe(false);
    expect(orchestrator.isAllDone()).toBe(false);
    expect(orchestrator.isEagerlyInitialized(Settings, InitializerKind.Sync)).toBe(true);

    await orchestrator.awaitAll();

    expect(orchestrator.isInitialized(Telemetry)).toBe(true);
  });

  it('keeps sibling jobs running when one fails', async () => {
    const Good = component<string>('Good');
    const Bad = component<string>('Bad');
    const boom = new Error('bad start');
    const registry = new InitializerRegistry()
      .register(Good, () => asyncInitializer({ create: async () => 'good' }))
      .register(Bad, () =>
        asyncInitializer<string>({
          create: async () => {
            throw boom;
          },
        })
      );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    orchestrator.bulkInitialize([
      { token: Bad, kind: InitializerKind.Async },
      { token: Good, kind: InitializerKind.Async },
    ]);

    const error = await orchestrator.awaitAll().then(
      () => undefined,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(AwaitAllFailedError);
    expect(error).toMatchObject({ jobLabel: describeComponent(Bad) });
    expect(error).toHaveProperty('cause.cause', boom);
    expect(orchestrator.isInitialized(Good)).toBe(true);
    expect(orchestrator.isAllDone()).toBe(true);
    await expect(orchestrator.awaitAll()).rejects.toBeInstanceOf(AwaitAllFailedError);
  });

  it('throws sync failures to the caller before launching anything', () => {
    const Broken = component<string>('Broken');
    const Later = component<string>('Later');
    const laterCreate = vi.fn(async () => 'later');
    const registry = new InitializerRegistry()
      .register(Broken, () =>
        syncInitializer<string>({
          create: () => {
            throw new Error('broken');
          },
        })
      )
      .register(Later, () => asyncInitializer({ create: laterCreate }));
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    const error = captureError(() =>
      orchestrator.bulkInitialize([
        { token: Later, kind: InitializerKind.Async },
        { token: Broken, kind: InitializerKind.Sync },
      ])
    );

    expect(error).toBeInstanceOf(InitializationFailedError);
    expect(orchestrator.jobs.size).toBe(0);
    expect(laterCreate).not.toHaveBeenCalled();
  });

  it('validates every descriptor before initializing', () => {
    const Valid = component<string>('Valid');
    const create = vi.fn(() => 'valid');
    const registry = new InitializerRegistry().register(Valid, () => syncInitializer({ create }));
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    const error = captureError(() =>
      orchestrator.bulkInitialize([
        { token: Valid, kind: InitializerKind.Sync },
        { token: Valid, kind: 'lazy' } as never,
      ])
    );

    expect(error).toBeInstanceOf(InvalidDescriptorError);
    expect(create).not.toHaveBeenCalled();
    expect(orchestrator.isEagerlyInitialized(Valid)).toBe(false);
  });

  it('initializes the batch returned by discovery', async () => {
    const Config = component<string>('Config');
    const Cache = component<string>('Cache');
    const Admin = component<string>('Admin');
    const adminCreate = vi.fn(() => 'admin');
    const registry = new InitializerRegistry()
      .register(Config, () => syncInitializer({ create: () => 'config' }), { eager: true })
      .register(Cache, () => asyncInitializer({ create: async () => 'cache' }), { eager: true })
      .register(Admin, () => syncInitializer({ create: adminCreate }));
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    const jobs = orchestrator.discoverAndInitialize(registry);
    await orchestrator.awaitAll();

    expect(jobs).toHaveLength(1);
    expect(orchestrator.isInitialized(Config)).toBe(true);
    expect(orchestrator.isInitialized(Cache)).toBe(true);
    expect(orchestrator.isEagerlyInitialized(Admin)).toBe(false);
    expect(adminCreate).not.toHaveBeenCalled();
  });

  it('wraps discovery failures', () => {
    const boom = new Error('scan failed');
    const orchestrator = new StartupOrchestrator({
      lookup: new InitializerRegistry(),
      context: undefined,
      logger: silentLogger(),
    });

    const error = captureError(() =>
      orchestrator.discoverAndInitialize({
        discover: () => {
          throw boom;
        },
      })
    );

    expect(error).toBeInstanceOf(DiscoveryFailedError);
    expect(error).toMatchObject({ cause: boom });
  });

  it('logs discovered components when debug is enabled', () => {
    const Config = component<string>('Config');
    const logger = silentLogger();
    const registry = new InitializerRegistry().register(Config, () =>
      syncInitializer({ create: () => 'config' })
    );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger,
      debug: true,
    });

    orchestrator.bulkInitialize([{ token: Config, kind: InitializerKind.Sync }]);

    expect(logger.debug).toHaveBeenNthCalledWith(1, `Discovered ${describeComponent(Config)}`);
  });
});

describe('StartupOrchestrator jobs', () => {
  it('runs launched resolutions in the background', async () => {
    const Worker = component<string>('Worker');
    const gate = deferred();
    const registry = new InitializerRegistry().register(Worker, () =>
      asyncInitializer({
        create: async () => {
          await gate.promise;
          return 'worker';
        },
      })
    );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    const job = orchestrator.launchAsync(Worker);

    expect(job.state).toBe('running');
    expect(orchestrator.isAllDone()).toBe(false);

    gate.resolve();
    await orchestrator.awaitAll();

    expect(job.state).toBe('succeeded');
    expect(orchestrator.resolveSync(Worker)).toBe('worker');
  });

  it('does not start launched jobs inside the caller resolution', async () => {
    const Parent = component<string>('Parent');
    const Child = component<string>('Child');
    const registry = new InitializerRegistry()
      .register(Parent, () =>
        asyncInitializer({
          create: async () => {
            orchestrator.launchAsync(Child);
            return 'parent';
          },
        })
      )
      .register(Child, () =>
        asyncInitializer({ create: async () => `child(${await orchestrator.resolveAsync(Parent)})` })
      );
    const orchestrator: StartupOrchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    await expect(orchestrator.resolveAsync(Parent)).resolves.toBe('parent');
    await orchestrator.awaitAll();

    expect(orchestrator.resolveSync(Child)).toBe('child(parent)');
  });

  it('tracks jobs launched after a completed wait as a new batch', async () => {
    const First = component<string>('First');
    const Second = component<string>('Second');
    const gate = deferred();
    const registry = new InitializerRegistry()
      .register(First, () => asyncInitializer({ create: async () => 'first' }))
      .register(Second, () =>
        asyncInitializer({
          create: async () => {
            await gate.promise;
            return 'second';
          },
        })
      );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });

    orchestrator.launchAsync(First);
    await orchestrator.awaitAll();
    expect(orchestrator.jobs.size).toBe(0);

    const job = orchestrator.launchAsync(Second);

    expect(orchestrator.isAllDone()).toBe(false);
    expect(orchestrator.jobs.size).toBe(1);
    expect(orchestrator.jobs.getJobs()).toEqual([job]);

    const waiting = orchestrator.awaitAll();
    gate.resolve();
    await waiting;

    expect(job.state).toBe('succeeded');
    expect(orchestrator.isInitialized(Second)).toBe(true);
    expect(orchestrator.jobs.size).toBe(0);
  });

  it('fails jobs that exceed jobTimeoutMs', async () => {
    const Stuck = component<string>('Stuck');
    const registry = new InitializerRegistry().register(Stuck, () =>
      asyncInitializer({ create: () => new Promise<string>(() => undefined) })
    );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
      jobTimeoutMs: 10,
    });

    orchestrator.launchAsync(Stuck);

    await expect(orchestrator.awaitAll()).rejects.toMatchObject({
      jobLabel: describeComponent(Stuck),
      cause: expect.objectContaining({ name: 'JobTimeoutError' }),
    });
  });

  it('runs the completion callback once every job finished', async () => {
    const Cache = component<string>('Cache');
    const registry = new InitializerRegistry().register(Cache, () =>
      asyncInitializer({ create: async () => 'cache' })
    );
    const orchestrator = new StartupOrchestrator({
      lookup: registry,
      context: undefined,
      logger: silentLogger(),
    });
    const callback = vi.fn((o: StartupOrchestrator) => {
      expect(o.isInitialized(Cache)).toBe(true);
    });

    orchestrator.launchAsync(Cache);
    await orchestrator.onStartupComplete(callback);

    expect(callback).toHaveBeenCalledWith(orchestrator);
  });
});
