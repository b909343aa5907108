// Re-export all types

export { BoundsError, OverlapError } from "./errors.ts";
export { createMultisplice } from "./multisplice.ts";
export {
  excluded,
  fullRange,
  included,
  isCharBoundary,
  range,
  rangeFrom,
  rangeInclusive,
  rangeTo,
  rangeToInclusive,
  resolveRange,
  unbounded,
} from "./range.ts";
export * from "./types.ts";
