/**
 * Multisplice: repeated substring replacement against a fixed source.
 *
 * Splices are addressed by offsets into the original string and kept sorted
 * by start. Rendering walks the sorted list once per query, so offsets never
 * need re-computing after an edit.
 */

import { BoundsError, OverlapError } from "./errors.ts";
import { isCharBoundary, resolveRange } from "./range.ts";
import type {
  InsertionMode,
  Multisplice,
  MultispliceOptions,
  OverlapCheck,
  Splice,
  SpliceRange,
} from "./types.ts";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Validate `[start, end)` against the source.
 * Out-of-range slicing has no sane result, so nothing is clamped.
 */
function checkRange(source: string, start: number, end: number): void {
  const length = source.length;
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new BoundsError(start, end, length, "has non-integer offsets");
  }
  if (end > length) {
    throw new BoundsError(start, end, length, "ends past the source");
  }
  if (start < 0) {
    throw new BoundsError(start, end, length, "starts before the source");
  }
  if (start > end) {
    throw new BoundsError(start, end, length, "is reversed");
  }
  if (!isCharBoundary(source, start) || !isCharBoundary(source, end)) {
    throw new BoundsError(start, end, length, "splits a surrogate pair");
  }
}

function collides(
  check: OverlapCheck,
  existing: Splice,
  start: number,
  end: number,
): boolean {
  if (existing.start <= start && start < existing.end) return true;
  if (check === "range") {
    return start < existing.end && existing.start < end;
  }
  return false;
}

// =============================================================================
// Multisplice
// =============================================================================

class MultispliceImpl implements Multisplice {
  readonly overlapCheck: OverlapCheck;
  readonly insertions: InsertionMode;
  private readonly _source: string;
  private readonly _splices: Splice[] = [];

  constructor(source: string, options: MultispliceOptions) {
    this._source = source;
    this.overlapCheck = options.overlapCheck ?? "start";
    this.insertions = options.insertions ?? "interior";
  }

  get source(): string {
    return this._source;
  }

  get splices(): readonly Splice[] {
    return this._splices;
  }

  get size(): number {
    return this._splices.length;
  }

  splice(start: number, end: number, value: string): void {
    checkRange(this._source, start, end);

    // Sorted insert: before the first splice starting after `start`.
    // Equal starts (only possible next to an empty splice) land after it.
    let insertAt: number | undefined;
    for (const [index, existing] of this._splices.entries()) {
      if (collides(this.overlapCheck, existing, start, end)) {
        throw new OverlapError(start, end, existing);
      }
      if (insertAt === undefined && existing.start > start) {
        insertAt = index;
        // Later splices start even further right; only a full-range
        // check can still hit one of them.
        if (this.overlapCheck === "start") break;
      }
      if (insertAt !== undefined && existing.start >= end) break;
    }

    this._splices.splice(
      insertAt ?? this._splices.length,
      0,
      Object.freeze({ start, end, value }),
    );
  }

  spliceRange(range: SpliceRange, value: string): void {
    const { start, end } = resolveRange(range, this._source.length);
    this.splice(start, end, value);
  }

  slice(start: number, end: number): string {
    const source = this._source;
    checkRange(source, start, end);

    const anchored = this.insertions === "anchored";
    // Anchored insertions at the very end of the source belong to the
    // non-empty window that reaches it (or to the whole of an empty source).
    const ownsEnd =
      anchored && end === source.length && (start < end || start === 0);

    const parts: string[] = [];
    let last = start;
    for (const splice of this._splices) {
      const anchoredInsertion = anchored && splice.start === splice.end;
      // Already covered by an earlier splice, or entirely before the window.
      if (splice.end < last || (splice.end === last && !anchoredInsertion)) {
        continue;
      }
      if (
        splice.start >= end &&
        !(anchoredInsertion && splice.start === end && ownsEnd)
      ) {
        break;
      }
      if (splice.start >= last) {
        parts.push(source.slice(last, splice.start));
      }
      // Values are atomic: emitted whole even when the window starts or
      // ends inside the spliced range.
      parts.push(splice.value);
      last = splice.end;
    }

    if (parts.length === 0) {
      return source.slice(last, end);
    }
    // A window ending inside the last splice is already covered by its value.
    if (end >= last) {
      parts.push(source.slice(last, end));
    }
    return parts.join("");
  }

  sliceRange(range: SpliceRange): string {
    const { start, end } = resolveRange(range, this._source.length);
    return this.slice(start, end);
  }

  toString(): string {
    return this.slice(0, this._source.length);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createMultisplice(
  source: string,
  options: MultispliceOptions = {},
): Multisplice {
  return new MultispliceImpl(source, options);
}
