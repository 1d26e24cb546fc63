// src/util/vector.ts
// What: Vector helpers for storage and scoring.
// How: vectorToBlob/blobToVector pack embeddings as little-endian float32; cosineSimilarity compares two
//      vectors of equal width; clampSimilarity bounds a raw cosine to [0,1].

export function vectorToBlob(v: readonly number[]): Buffer {
  const buf = Buffer.alloc(v.length * 4);
  v.forEach((x, i) => buf.writeFloatLE(x, i * 4));
  return buf;
}

export function blobToVector(blob: Buffer): number[] {
  const out: number[] = new Array(blob.length / 4);
  for (let i = 0; i < out.length; i++) {
    out[i] = blob.readFloatLE(i * 4);
  }
  return out;
}

/** Raw cosine in [-1,1]; 0 when either vector has zero length. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have same length (${a.length} vs ${b.length})`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function clampSimilarity(sim: number): number {
  if (!Number.isFinite(sim) || sim < 0) return 0;
  if (sim > 1) return 1;
  return sim;
}
