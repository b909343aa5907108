/**
 * Test helpers and utilities.
 */

import { createMultisplice } from "../src/multisplice/multisplice.ts";
import type {
  Multisplice,
  MultispliceOptions,
} from "../src/multisplice/types.ts";

// =============================================================================
// Constructors (for tests only)
// =============================================================================

export interface Edit {
  readonly start: number;
  readonly end: number;
  readonly value: string;
}

export function edit(start: number, end: number, value: string): Edit {
  return { start, end, value };
}

/**
 * Create a splicer over `source` and register `edits` in the given order.
 */
export function splicer(
  source: string,
  edits: readonly Edit[] = [],
  options?: MultispliceOptions,
): Multisplice {
  const splices = createMultisplice(source, options);
  for (const e of edits) {
    splices.splice(e.start, e.end, e.value);
  }
  return splices;
}

// =============================================================================
// Reference Rendering
// =============================================================================

/**
 * Apply sorted, disjoint, non-empty edits the naive way: back to front,
 * so earlier offsets stay valid.
 */
export function applyReference(source: string, edits: readonly Edit[]): string {
  const sorted = [...edits].sort((a, b) => b.start - a.start);
  let result = source;
  for (const e of sorted) {
    result = result.slice(0, e.start) + e.value + result.slice(e.end);
  }
  return result;
}

// =============================================================================
// Test Data Generators
// =============================================================================

/**
 * Deterministic PRNG (mulberry32) so shuffles are reproducible.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = out[i];
    const b = out[j];
    if (a === undefined || b === undefined) continue;
    out[i] = b;
    out[j] = a;
  }
  return out;
}

/**
 * Generate a text blob with N lines.
 */
export function generateText(lineCount: number, prefix = "Line"): string {
  return Array.from({ length: lineCount }, (_, i) => `${prefix} ${i + 1}`).join(
    "\n",
  );
}

/**
 * Generate `count` sorted, disjoint, non-empty edits over a source of
 * `length` code units. Every third edit is a deletion.
 *
 * Each edit lives in the first part of its own slot of `length / count`
 * units, so no two edits overlap or touch.
 */
export function disjointEdits(
  length: number,
  count: number,
  random: () => number,
): Edit[] {
  const slot = Math.floor(length / count);
  if (slot < 4) {
    throw new RangeError(`Source of length ${length} too short for ${count} edits`);
  }
  const half = Math.floor(slot / 2);
  return Array.from({ length: count }, (_, i) => {
    const start = i * slot + Math.floor(random() * half);
    const end = start + 1 + Math.floor(random() * half);
    const value = i % 3 === 0 ? "" : `<${"x".repeat(i % 5)}${i}>`;
    return edit(start, end, value);
  });
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Measure execution time of a function.
 */
export function time<T>(fn: () => T): { result: T; durationMs: number } {
  const start = performance.now();
  const result = fn();
  const durationMs = performance.now() - start;
  return { result, durationMs };
}
