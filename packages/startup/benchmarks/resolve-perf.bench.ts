import { Bench } from 'tinybench';

import {
  asyncInitializer,
  bootstrap,
  component,
  InitializerRegistry,
  StartupOrchestrator,
  syncInitializer,
  type ComponentToken,
  type StartupLogger,
} from '../src/index.js';

/**
 * Startup Resolution Benchmark
 *
 * Builds a layered component graph (each component depends on every component
 * of the layer below) and measures cold initialization through both paths,
 * plus cached lookups on a warm orchestrator.
 */

const LAYERS = 5;
const WIDTH = 8;

const quietLogger: StartupLogger = {
  debug: () => undefined,
  warn: () => undefined,
  error: (message, error) => console.error(message, error),
};

function layeredTokens(prefix: string): ComponentToken<number>[][] {
  return Array.from({ length: LAYERS }, (_, layer) =>
    Array.from({ length: WIDTH }, (_, i) => component<number>(`${prefix}L${layer}C${i}`))
  );
}

const syncLayers = layeredTokens('Sync');
const asyncLayers = layeredTokens('Async');
const syncTop = syncLayers[LAYERS - 1];
const asyncTop = asyncLayers[LAYERS - 1];

function buildRegistry(): InitializerRegistry {
  const registry = new InitializerRegistry();

  syncLayers.forEach((layer, depth) => {
    const dependencies = depth === 0 ? [] : syncLayers[depth - 1];
    layer.forEach((token, i) => {
      registry.register(token, () =>
        syncInitializer({ dependencies, create: () => depth * WIDTH + i })
      );
    });
  });

  asyncLayers.forEach((layer, depth) => {
    const dependencies = depth === 0 ? [] : asyncLayers[depth - 1];
    layer.forEach((token, i) => {
      registry.register(
        token,
        () => asyncInitializer({ dependencies, create: async () => depth * WIDTH + i }),
        { eager: depth === LAYERS - 1 }
      );
    });
  });

  return registry;
}

const registry = buildRegistry();

const coldOrchestrator = () =>
  new StartupOrchestrator({
    lookup: registry,
    context: undefined,
    logger: quietLogger,
    debug: false,
  });

async function runResolveBenchmark() {
  console.log('=== Startup Resolution Benchmark ===\n');
  console.log(`[graph] ${LAYERS} layers x ${WIDTH} components per path\n`);

  const warm = coldOrchestrator();
  syncTop.forEach((token) => warm.resolveSync(token));
  for (const token of asyncTop) await warm.resolveAsync(token);

  const bench = new Bench({ time: 1000 });

  bench
    .add('T1: resolveSync (cold graph)', () => {
      const orchestrator = coldOrchestrator();
      syncTop.forEach((token) => orchestrator.resolveSync(token));
    })
    .add('T2: resolveAsync (cold graph)', async () => {
      const orchestrator = coldOrchestrator();
      for (const token of asyncTop) await orchestrator.resolveAsync(token);
    })
    .add('T3: bootstrap + awaitAll (cold eager batch)', async () => {
      const orchestrator = bootstrap({
        registry,
        context: undefined,
        logger: quietLogger,
        debug: false,
      });
      await orchestrator.awaitAll();
    })
    .add('T4: resolveSync (cached)', () => {
      warm.resolveSync(syncTop[0]);
    })
    .add('T5: resolveAsync (cached)', async () => {
      await warm.resolveAsync(asyncTop[0]);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getMs = (name: string) => bench.tasks.find((t) => t.name === name)?.result?.mean ?? 0;

  const components = LAYERS * WIDTH;
  const perComponentNs = (name: string) => ((getMs(name) / components) * 1_000_000).toFixed(0);

  console.log('\nPer-component cost:');
  console.log(`  Sync (T1 / ${components}):   ${perComponentNs('T1: resolveSync (cold graph)')} ns`);
  console.log(`  Async (T2 / ${components}):  ${perComponentNs('T2: resolveAsync (cold graph)')} ns`);
}

runResolveBenchmark().catch(console.error);
