/**
 * Benchmark runner for multisplice.
 *
 * Run with: npm run bench
 */

import { type BenchmarkSuite, runBenchmarks } from "./harness.ts";
import { spliceBenchmarks } from "./splice.bench.ts";

const suites: BenchmarkSuite[] = [spliceBenchmarks];

console.log("=".repeat(60));
console.log("Multisplice Performance Benchmarks");
console.log("=".repeat(60));
console.log("");

runBenchmarks(suites);
