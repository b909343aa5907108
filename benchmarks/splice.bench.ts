/**
 * Multisplice benchmarks.
 *
 * Key performance targets:
 * - Registration: linear scan per splice, <5ms for 1K sorted splices
 * - Full render: single pass, <1ms for 1K splices over a 10K line source
 * - Window render: proportional to splices before the window end
 */

import { createMultisplice } from "../src/multisplice/multisplice.ts";
import type { Multisplice } from "../src/multisplice/types.ts";
import { generateText } from "../tests/helpers.ts";
import type { BenchmarkSuite } from "./harness.ts";

const source10k = generateText(10_000);
const STRIDE = 90;

/** 1K splices, one per `STRIDE` code units, each replacing the first 4. */
function spliced1k(): Multisplice {
  const splices = createMultisplice(source10k);
  for (let i = 0; i < 1000; i++) {
    splices.splice(i * STRIDE, i * STRIDE + 4, `#${i}`);
  }
  return splices;
}

export const spliceBenchmarks: BenchmarkSuite = {
  name: "Multisplice Operations",
  benchmarks: [
    {
      name: "Register 1K splices in order",
      iterations: 50,
      targetMs: 5,
      prepare: () => () => {
        spliced1k();
      },
    },
    {
      name: "Register 1K splices in reverse",
      iterations: 50,
      targetMs: 5,
      prepare: () => () => {
        const splices = createMultisplice(source10k);
        for (let i = 999; i >= 0; i--) {
          splices.splice(i * STRIDE, i * STRIDE + 4, `#${i}`);
        }
      },
    },
    {
      name: "Full render (1K splices, 10K lines)",
      iterations: 200,
      targetMs: 1,
      prepare: () => {
        const splices = spliced1k();
        return () => {
          splices.toString();
        };
      },
    },
    {
      name: "Window render near start",
      iterations: 10_000,
      targetMs: 0.01,
      prepare: () => {
        const splices = spliced1k();
        return () => {
          splices.slice(1000, 2000);
        };
      },
    },
    {
      name: "Window render near end",
      iterations: 1000,
      targetMs: 0.1,
      prepare: () => {
        const splices = spliced1k();
        return () => {
          splices.slice(88_000, 89_000);
        };
      },
    },
    {
      name: "Window render between splices",
      iterations: 10_000,
      targetMs: 0.01,
      prepare: () => {
        const splices = spliced1k();
        return () => {
          splices.slice(500 * STRIDE + 5, 501 * STRIDE);
        };
      },
    },
  ],
};
