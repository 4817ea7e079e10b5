/**
 * Stress Engine — Seedable Random Source
 *
 * mulberry32 uniform generator with Box–Muller normals. Every simulation
 * owns its generator; nothing here touches global state.
 */

import { ValuationError } from "@/lib/valuationModel/errors";
import type { DistributionSpec } from "./types";

const UINT32_RANGE = 4294967296;

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
  /** Standard normal */
  normal(): number;
}

export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  };
}

export function createRandomSource(seed: number): RandomSource {
  const uniform = mulberry32(seed);
  let spare: number | undefined;

  return {
    next: uniform,
    normal() {
      if (spare !== undefined) {
        const z = spare;
        spare = undefined;
        return z;
      }
      // 1 - u keeps the log argument in (0, 1]
      const u1 = 1 - uniform();
      const u2 = uniform();
      const r = Math.sqrt(-2 * Math.log(u1));
      spare = r * Math.sin(2 * Math.PI * u2);
      return r * Math.cos(2 * Math.PI * u2);
    },
  };
}

/** Independent uint32 seed for substream `stream` of `seed`. */
export function deriveSeed(seed: number, stream: number): number {
  let h = (seed ^ Math.imul(stream + 1, 0x9e3779b9)) >>> 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b) >>> 0;
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35) >>> 0;
  return (h ^ (h >>> 16)) >>> 0;
}

export function randomSeed(): number {
  return Math.floor(Math.random() * UINT32_RANGE) >>> 0;
}

export function assertSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed >= UINT32_RANGE) {
    throw new ValuationError("INVALID_INPUT", `seed must be an integer in [0, 2^32), got ${seed}`, {
      parameter: "seed",
    });
  }
}

/** Zero-mean perturbation drawn from `spec`. */
export function samplePerturbation(spec: DistributionSpec, rng: RandomSource): number {
  switch (spec.kind) {
    case "normal":
      return spec.std * rng.normal();
    case "uniform":
      return (2 * rng.next() - 1) * spec.halfWidth;
  }
}
