export function cosineSimilarity(a: readonly number[], b: readonly number[]) {
  if (a.length === 0 || a.length !== b.length) return 0
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0
    const y = b[i] ?? 0
    dot += x * y
    normA += x * x
    normB += y * y
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export type Scored<T> = { item: T; score: number }

/**
 * Score candidates against the query embedding and keep the best `topK`
 * whose similarity reaches `minSimilarity`, highest first.
 */
export function rankBySimilarity<T extends { embedding: readonly number[] }>(
  queryEmbedding: readonly number[],
  candidates: readonly T[],
  opts: { topK: number; minSimilarity: number }
): Scored<T>[] {
  return candidates
    .map((item) => ({ item, score: cosineSimilarity(queryEmbedding, item.embedding) }))
    .filter((s) => s.score >= opts.minSimilarity)
    .sort((a, b) => b.score - a.score)
    .slice(0, opts.topK)
}
