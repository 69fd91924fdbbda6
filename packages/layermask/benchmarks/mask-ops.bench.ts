import { Bench } from 'tinybench';

import { Layer, Mask } from '../src/index.js';

/**
 * Mask Operations Benchmark
 *
 * Measures the cost of the typed Mask against the raw integer bit twiddling it
 * replaces: construction, algebra, equality and the fluent query façades.
 */

const walkable = Mask.of(Layer.Default, Layer.Water, Layer.L11);
const blocking = Mask.of(Layer.L13, Layer.L21);
const rawWalkable = (1 << Layer.Default) | (1 << Layer.Water) | (1 << Layer.L11);
const rawBlocking = (1 << Layer.L13) | (1 << Layer.L21);

// Keeps results observable so the engine cannot drop the work.
let sink = 0;

async function runMaskBenchmark() {
  console.log('=== Mask Operations Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  bench
    .add('B1: raw: union + test bit', () => {
      const bits = rawWalkable | rawBlocking;
      sink ^= (bits >>> Layer.L13) & 1;
    })
    .add('B2: Mask: union + contains', () => {
      const mask = walkable.union(blocking);
      sink ^= mask.contains(Layer.L13) ? 1 : 0;
    })
    .add('B3: Mask: of() from layers', () => {
      sink ^= Mask.of(Layer.Default, Layer.UI, Layer.L20).bits;
    })
    .add('B4: Mask: complement + subtract', () => {
      sink ^= walkable.complement().subtract(blocking).bits;
    })
    .add('B5: Mask: equals(collection)', () => {
      sink ^= walkable.equals([Layer.Default, Layer.Water, Layer.L11]) ? 1 : 0;
    })
    .add('B6: Mask: contains().only()', () => {
      sink ^= walkable.contains().only(Layer.Default, Layer.Water, Layer.L11) ? 1 : 0;
    })
    .add('B7: Mask: is().any()', () => {
      sink ^= walkable.is().any(blocking, Layer.UI, walkable) ? 1 : 0;
    })
    .add('B8: Mask: iterate layers', () => {
      for (const layer of Mask.AllLayers) sink ^= layer;
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period ?? 0) * 1_000_000;
  };

  const raw = getNs('B1: raw: union + test bit');
  const typed = getNs('B2: Mask: union + contains');
  console.log('\nTyped overhead:');
  console.log(`  raw union + bit test (B1):   ${raw.toFixed(0)} ns`);
  console.log(`  Mask union + contains (B2):  ${typed.toFixed(0)} ns`);
  console.log(`  overhead (B2 - B1):          +${(typed - raw).toFixed(0)} ns`);
  console.log(`\n(sink ${sink})`);
}

runMaskBenchmark().catch(console.error);
