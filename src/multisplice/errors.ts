/**
 * Errors thrown by the splice registry.
 *
 * Both are programmer errors in offset bookkeeping: they are thrown
 * immediately and never caught or clamped inside the library.
 */

import type { Splice } from "./types.ts";

/** A registration collides with an already stored splice. */
export class OverlapError extends Error {
  readonly name = "OverlapError";
  readonly start: number;
  readonly end: number;
  readonly existing: Splice;

  constructor(start: number, end: number, existing: Splice) {
    super(
      `Splice [${start}, ${end}) overlaps already spliced range [${existing.start}, ${existing.end})`,
    );
    this.start = start;
    this.end = end;
    this.existing = existing;
  }
}

/** Offsets fall outside the source or off a character boundary. */
export class BoundsError extends RangeError {
  readonly name = "BoundsError";
  readonly start: number;
  readonly end: number;
  readonly length: number;

  constructor(start: number, end: number, length: number, reason: string) {
    super(`Range [${start}, ${end}) ${reason} (source length ${length})`);
    this.start = start;
    this.end = end;
    this.length = length;
  }
}
