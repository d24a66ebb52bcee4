export function dotProduct(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error("Embedding dimension mismatch");
  }
  let dot = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return dot;
}

export function l2Norm(v: readonly number[]): number {
  return Math.sqrt(dotProduct(v, v));
}

/** Unit-length copy of `v`; a zero vector stays zero. */
export function normalizeVector(v: readonly number[]): number[] {
  const norm = l2Norm(v);
  return norm === 0 ? v.map(() => 0) : v.map((x) => x / norm);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const denom = l2Norm(a) * l2Norm(b);
  return denom === 0 ? 0 : dotProduct(a, b) / denom;
}
