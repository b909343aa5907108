/**
 * Benchmark harness: times each operation and checks it against a target.
 */

export interface Benchmark {
  name: string;
  iterations: number;
  /** Upper bound on the average time per iteration, in ms. */
  targetMs: number;
  /** Build fresh state and return the operation to measure. */
  prepare: () => () => void;
}

export interface BenchmarkSuite {
  name: string;
  benchmarks: Benchmark[];
}

export interface BenchmarkResult {
  name: string;
  iterations: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  targetMs: number;
  passed: boolean;
}

export function runBenchmark(bench: Benchmark): BenchmarkResult {
  const fn = bench.prepare();

  // Warmup
  for (let i = 0; i < Math.max(10, bench.iterations / 10); i++) {
    fn();
  }

  let totalMs = 0;
  let minMs = Number.POSITIVE_INFINITY;
  let maxMs = 0;
  for (let i = 0; i < bench.iterations; i++) {
    const start = performance.now();
    fn();
    const elapsed = performance.now() - start;
    totalMs += elapsed;
    minMs = Math.min(minMs, elapsed);
    maxMs = Math.max(maxMs, elapsed);
  }

  const avgMs = totalMs / bench.iterations;
  return {
    name: bench.name,
    iterations: bench.iterations,
    avgMs,
    minMs,
    maxMs,
    targetMs: bench.targetMs,
    passed: avgMs <= bench.targetMs,
  };
}

function formatMs(ms: number): string {
  return ms < 0.01 ? `${(ms * 1000).toFixed(2)}µs` : `${ms.toFixed(3)}ms`;
}

export function formatResult(result: BenchmarkResult): string {
  const status = result.passed ? "✓" : "✗";
  return [
    `${status} ${result.name}`,
    `  avg: ${formatMs(result.avgMs)} (target: <${result.targetMs}ms)`,
    `  min: ${formatMs(result.minMs)}, max: ${formatMs(result.maxMs)}, iterations: ${result.iterations}`,
  ].join("\n");
}

/**
 * Run every suite and print the results.
 * Sets a failing exit code when any benchmark misses its target.
 */
export function runBenchmarks(suites: BenchmarkSuite[]): void {
  let failed = 0;
  let total = 0;

  for (const suite of suites) {
    console.log(`\n## ${suite.name}\n`);
    for (const bench of suite.benchmarks) {
      const result = runBenchmark(bench);
      console.log(`${formatResult(result)}\n`);
      total++;
      if (!result.passed) failed++;
    }
  }

  console.log(`Results: ${total - failed} passed, ${failed} failed`);
  if (failed > 0) {
    process.exitCode = 1;
  }
}
