// mulberry32
export function createSeededRandom(seed: number): () => number {
  let value = seed >>> 0;
  return () => {
    value = (value + 0x6d2b79f5) >>> 0;
    let t = value;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform sample of `count` distinct indices out of `[0, size)`, in draw order.
 * Partial Fisher-Yates over an index array.
 */
export function sampleIndices(size: number, count: number, random: () => number): number[] {
  const indices = Array.from({ length: size }, (_, i) => i);
  const take = Math.max(0, Math.min(Math.floor(count), size));
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (size - i));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  return indices.slice(0, take);
}
