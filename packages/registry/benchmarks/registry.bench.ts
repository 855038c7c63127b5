import { Bench } from 'tinybench';

import { Registry } from '../src/index.js';
import { Priority } from '../src/types/types.js';

/**
 * Registry Performance Benchmark
 *
 * Measures registration, batch initialization across priority slices, and
 * lookup of cached singletons (default and named).
 */

// --- 1. Test Services (flat, spread over priorities) ---
class Config {
  values = new Map<string, string>();
  load() {
    this.values.set('env', 'bench');
  }
}

class Logger {
  lines = 0;
  open() {
    this.lines = 0;
  }
}

class Database {
  connected = false;
  connect() {
    this.connected = true;
  }
}

class UserService {
  db?: Database;
  logger?: Logger;
}

const REPLICAS = ['a', 'b', 'c', 'd'];

const bootstrap = () => {
  const registry = new Registry({ name: 'bench', logLevel: 'silent' });
  registry.registerClass(Config, { priority: Priority.Earliest, init: 'load' });
  registry.registerClass(Logger, { priority: 1, init: 'open' });
  registry.registerClass(Database, { priority: 3, init: 'connect' });
  for (const name of REPLICAS) registry.registerNamed(Database, name, { priority: 4, init: 'connect' });
  registry.registerClass(UserService, {
    priority: Priority.Latest,
    init: (service) => {
      service.db = registry.get(Database);
      service.logger = registry.get(Logger);
    },
  });
  return registry;
};

async function runRegistryBenchmark() {
  console.log('=== Registry Performance Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const warm = bootstrap();
  warm.executeAllInits();
  const warmAsync = bootstrap();
  await warmAsync.executeAllInitsAsync();

  console.log('[phase] warmup complete: registries built and initialized\n');

  bench
    // T1: registration only
    .add('T1: Register Only (Cold)', () => {
      bootstrap();
    })

    // T2: registration plus a full synchronous batch pass
    .add('T2: Cold Start (executeAllInits)', () => {
      bootstrap().executeAllInits();
    })

    // T3: registration plus the asynchronous batch pass
    .add('T3: Cold Start (executeAllInitsAsync)', async () => {
      await bootstrap().executeAllInitsAsync();
    })

    // T4: cached default instance
    .add('T4: Warm get (Default Instance)', () => {
      warm.get(UserService);
    })

    // T5: cached named instance
    .add('T5: Warm get (Named Instance)', () => {
      warm.get(Database, 'c');
    })

    // T6: cached instance through the async lane
    .add('T6: Warm getAsync', async () => {
      await warmAsync.getAsync(UserService);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  console.log('\n=== Breakdown ===\n');

  const getMs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period || 0) * 1000;
  };

  const registration = getMs('T1: Register Only (Cold)');
  const coldSync = getMs('T2: Cold Start (executeAllInits)');
  const coldAsync = getMs('T3: Cold Start (executeAllInitsAsync)');

  console.log(`  Registration Cost (T1):        ${registration.toFixed(3)} ms`);
  console.log(`  Batch Init Cost (T2 - T1):     ${(coldSync - registration).toFixed(3)} ms`);
  console.log(`  Async Batch Overhead (T3 - T2): ${(coldAsync - coldSync).toFixed(3)} ms`);

  const defaultNs = getMs('T4: Warm get (Default Instance)') * 1_000_000;
  const namedNs = getMs('T5: Warm get (Named Instance)') * 1_000_000;
  console.log(`\n  Warm get (T4):                 ${defaultNs.toFixed(0)} ns`);
  console.log(`  Named get (T5):                ${namedNs.toFixed(0)} ns`);
  console.log(`  Name Key Overhead (T5 - T4):   +${(namedNs - defaultNs).toFixed(0)} ns`);
}

runRegistryBenchmark().catch(console.error);
