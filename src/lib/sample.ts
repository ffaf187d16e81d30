// src/lib/sample.ts
import type { SampleView, View } from "./types";

/** mulberry32: small seeded PRNG, uniform in [0, 1). */
export function seededRandom(seed: number) {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Caps a view for display. Views within the cap come back with their own row
 * indices; larger ones get exactly `cap` distinct rows, the same rows for the
 * same view and seed.
 */
export function sample(view: View, cap = 5000, seed = 42): SampleView {
  if (view.rowIndices.length <= cap) {
    return { view, rowIndices: view.rowIndices, seed, cap, sampled: false };
  }
  const rand = seededRandom(seed);
  const pool = [...view.rowIndices];
  // partial Fisher-Yates: the first `cap` slots end up holding the draw
  for (let i = 0; i < cap; i++) {
    const j = i + Math.floor(rand() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return { view, rowIndices: pool.slice(0, cap), seed, cap, sampled: true };
}
