/**
 * Small numeric helpers shared by the detectors, the feature extractor and
 * the synonym matcher.
 */

export function mean(data: number[]): number {
  if (data.length === 0) return 0;
  return data.reduce((sum, val) => sum + val, 0) / data.length;
}

/**
 * Sample standard deviation (n - 1 denominator). Returns 0 below two points.
 */
export function sampleStdev(data: number[]): number {
  if (data.length < 2) return 0;
  const avg = mean(data);
  const variance = data.reduce((sum, val) => sum + Math.pow(val - avg, 2), 0) / (data.length - 1);
  return Math.sqrt(variance);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator < 1e-10 ? 0 : dot / denominator;
}

export function similarityMatrix(vectors: number[][]): number[][] {
  return vectors.map(a => vectors.map(b => cosineSimilarity(a, b)));
}

/**
 * Greedy community detection over a cosine-similarity matrix.
 *
 * Every point collects the neighbours whose similarity reaches `threshold`
 * (itself included). Candidates of at least `minCommunitySize` are taken
 * largest first; a candidate overlapping an accepted community is dropped.
 * Returns index lists, each sorted ascending.
 */
export function communityDetection(
  vectors: number[][],
  threshold: number = 0.75,
  minCommunitySize: number = 2
): number[][] {
  if (vectors.length === 0) return [];

  const width = vectors[0].length;
  if (vectors.some(vector => vector.length !== width)) {
    throw new Error('Embedding vectors must share one dimension');
  }

  const similarities = similarityMatrix(vectors);
  const candidates: number[][] = [];

  similarities.forEach((row, index) => {
    const neighbours = row
      .map((similarity, other) => ({ similarity, other }))
      .filter(entry => entry.similarity >= threshold)
      .sort((a, b) => b.similarity - a.similarity || a.other - b.other)
      .map(entry => entry.other);

    if (neighbours.length >= minCommunitySize && neighbours.includes(index)) {
      candidates.push(neighbours);
    }
  });

  candidates.sort((a, b) => b.length - a.length);

  const taken = new Set<number>();
  const communities: number[][] = [];
  for (const candidate of candidates) {
    if (candidate.some(index => taken.has(index))) continue;
    candidate.forEach(index => taken.add(index));
    communities.push([...candidate].sort((a, b) => a - b));
  }

  return communities;
}

/**
 * Deterministic bag-of-words embedding: each lower-cased word is hashed into
 * one of `dimensions` buckets and the vector is L2-normalised. Titles that
 * share words end up close in cosine space.
 */
export function hashEmbedding(text: string, dimensions: number = 64): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

  for (const word of words) {
    let hash = 2166136261;
    for (let i = 0; i < word.length; i++) {
      hash ^= word.charCodeAt(i);
      hash = Math.imul(hash, 16777619) >>> 0;
    }
    vector[hash % dimensions] += 1;
  }

  const norm = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  return norm > 0 ? vector.map(val => val / norm) : vector;
}
