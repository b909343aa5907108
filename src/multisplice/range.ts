/**
 * Range specifications: construction and resolution to `[start, end)`.
 *
 * Registration and rendering both go through `resolveRange`, so a range
 * means the same thing to `spliceRange` and `sliceRange`.
 */

import type { Bound, ResolvedRange, SpliceRange } from "./types.ts";

// =============================================================================
// Bounds
// =============================================================================

export function included(offset: number): Bound {
  return { kind: "included", offset };
}

export function excluded(offset: number): Bound {
  return { kind: "excluded", offset };
}

export const unbounded: Bound = { kind: "unbounded" };

// =============================================================================
// Range Constructors
// =============================================================================

/** Half-open: `[start, end)`. */
export function range(start: number, end: number): SpliceRange {
  return { start: included(start), end: excluded(end) };
}

/** Inclusive end: `[start, end]`. */
export function rangeInclusive(start: number, end: number): SpliceRange {
  return { start: included(start), end: included(end) };
}

/** From `start` to the end of the source. */
export function rangeFrom(start: number): SpliceRange {
  return { start: included(start), end: unbounded };
}

/** From the start of the source up to `end`, exclusive. */
export function rangeTo(end: number): SpliceRange {
  return { start: unbounded, end: excluded(end) };
}

/** From the start of the source up to `end`, inclusive. */
export function rangeToInclusive(end: number): SpliceRange {
  return { start: unbounded, end: included(end) };
}

/** The whole source. */
export function fullRange(): SpliceRange {
  return { start: unbounded, end: unbounded };
}

// =============================================================================
// Resolution
// =============================================================================

function resolveStart(bound: Bound): number {
  switch (bound.kind) {
    case "included":
      return bound.offset;
    case "excluded":
      return bound.offset + 1;
    case "unbounded":
      return 0;
  }
}

function resolveEnd(bound: Bound, length: number): number {
  switch (bound.kind) {
    case "included":
      return bound.offset + 1;
    case "excluded":
      return bound.offset;
    case "unbounded":
      return length;
  }
}

/**
 * Resolve a range specification against a source of `length` code units.
 * No validation happens here; callers check the result.
 */
export function resolveRange(spec: SpliceRange, length: number): ResolvedRange {
  return {
    start: resolveStart(spec.start),
    end: resolveEnd(spec.end, length),
  };
}

// =============================================================================
// Boundaries
// =============================================================================

/**
 * True when `offset` can split `text` without cutting a surrogate pair.
 * Offsets outside `[0, text.length]` are never boundaries.
 */
export function isCharBoundary(text: string, offset: number): boolean {
  if (offset === 0 || offset === text.length) return true;
  if (offset < 0 || offset > text.length) return false;
  const before = text.charCodeAt(offset - 1);
  const after = text.charCodeAt(offset);
  // High surrogate followed by low surrogate: one code point.
  return !(
    before >= 0xd800 &&
    before <= 0xdbff &&
    after >= 0xdc00 &&
    after <= 0xdfff
  );
}
