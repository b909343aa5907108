/**
 * Core types for the multisplice data model.
 *
 * Design principles:
 * - The source string is never modified; every offset refers to it
 * - Splices are immutable once registered
 * - Rendering is a pure query over (source, splices)
 */

// =============================================================================
// Splice Types
// =============================================================================

/**
 * A single registered replacement over `[start, end)` in source coordinates.
 *
 * `value` may be empty (a deletion) and may be longer or shorter than the
 * span it replaces. A splice with `start === end` is a pure insertion.
 */
export interface Splice {
  readonly start: number;
  readonly end: number;
  readonly value: string;
}

// =============================================================================
// Range Types
// =============================================================================

/** One side of a range specification. */
export type Bound =
  | { readonly kind: "included"; readonly offset: number }
  | { readonly kind: "excluded"; readonly offset: number }
  | { readonly kind: "unbounded" };

/**
 * A range specification over source offsets.
 *
 * Covers half-open, inclusive-end, start-unbounded and end-unbounded forms.
 * See `resolveRange` for the resolution rules.
 */
export interface SpliceRange {
  readonly start: Bound;
  readonly end: Bound;
}

/** A concrete half-open `[start, end)` pair. */
export interface ResolvedRange {
  readonly start: number;
  readonly end: number;
}

// =============================================================================
// Options
// =============================================================================

/**
 * How registration detects collisions with stored splices.
 *
 * - `"start"`: reject only when the new start falls inside `[E.start, E.end)`
 *   of a stored splice. A new splice whose end reaches into a stored one, or
 *   that swallows one, is accepted.
 * - `"range"`: additionally reject any new splice whose span intersects a
 *   stored one (`start < E.end && E.start < end`).
 */
export type OverlapCheck = "start" | "range";

/**
 * Which windows render a zero-width splice (a pure insertion) at offset `p`.
 *
 * - `"interior"`: the plain scan. An insertion renders only when the cursor
 *   has not yet reached `p` and `p` is before the window end, so one sitting
 *   at the window start, at the window end, or right after another splice's
 *   end is skipped. `toString()` drops insertions at both ends of the source.
 * - `"anchored"`: an insertion renders when `start <= p < end`, or when
 *   `p === end === source.length` and the window is non-empty or covers the
 *   whole (empty) source. Windows `[0, a)` and `[a, length)` then partition
 *   the insertions for every `a`.
 */
export type InsertionMode = "interior" | "anchored";

export interface MultispliceOptions {
  /** Defaults to `"start"`. */
  readonly overlapCheck?: OverlapCheck;
  /** Defaults to `"interior"`. */
  readonly insertions?: InsertionMode;
}

// =============================================================================
// Multisplice
// =============================================================================

/**
 * A splice registry bound to one source string.
 *
 * Callers register replacements by original offsets in any order, then
 * render any window of the edited text without re-computing offsets.
 */
export interface Multisplice {
  /** The original text, exactly as passed in. */
  readonly source: string;

  /** Stored splices, sorted by ascending start. */
  readonly splices: readonly Splice[];

  /** Number of stored splices. */
  readonly size: number;

  readonly overlapCheck: OverlapCheck;

  readonly insertions: InsertionMode;

  /**
   * Replace `[start, end)` of the source with `value`.
   *
   * Throws `BoundsError` when the offsets fall outside the source or split a
   * surrogate pair, and `OverlapError` when the splice collides with a stored
   * one (see `OverlapCheck`).
   */
  splice(start: number, end: number, value: string): void;

  /** `splice` over a range specification. */
  spliceRange(range: SpliceRange, value: string): void;

  /**
   * Render the edited text for `[start, end)` in source coordinates.
   *
   * GOTCHA: replacement values are atomic. A window that starts or ends
   * inside a splice yields that splice's entire value, never a part of it.
   */
  slice(start: number, end: number): string;

  /** `slice` over a range specification. */
  sliceRange(range: SpliceRange): string;

  /** Render the whole edited text. */
  toString(): string;
}

// =============================================================================
// Factory Functions (type definitions only)
// =============================================================================

export type CreateMultisplice = (
  source: string,
  options?: MultispliceOptions,
) => Multisplice;
