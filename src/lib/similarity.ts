export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  if (left.length !== right.length) {
    return Number.NaN;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] * left[index];
    rightNorm += right[index] * right[index];
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

export type RankedIndex = {
  index: number;
  score: number;
};

/**
 * Indices of `candidates` ordered by descending cosine similarity to `query`.
 * NaN similarities (zero vectors, dimension mismatch) rank last as -Infinity.
 * Ties keep candidate order.
 */
export function rankBySimilarity(query: readonly number[], candidates: ReadonlyArray<readonly number[]>): RankedIndex[] {
  return candidates
    .map((embedding, index) => {
      const score = cosineSimilarity(query, embedding);
      return { index, score: Number.isNaN(score) ? Number.NEGATIVE_INFINITY : score };
    })
    .sort((left, right) => right.score - left.score || left.index - right.index);
}

/**
 * Maximal marginal relevance over a relevance-sorted pool. Starts from the
 * first (best) candidate, then repeatedly takes the argmax of
 * `lambda * relevance - (1 - lambda) * max similarity to the selected set`.
 * Returns selected pool indices in selection order.
 */
export function maxMarginalRelevance(params: {
  relevance: readonly number[];
  embeddings: ReadonlyArray<readonly number[]>;
  k: number;
  lambda: number;
}): number[] {
  const { relevance, embeddings, lambda } = params;
  const k = Math.min(params.k, relevance.length);
  if (k <= 0) {
    return [];
  }

  const selected = [0];
  const isSelected = new Array<boolean>(relevance.length).fill(false);
  isSelected[0] = true;
  // Running max similarity of each candidate to anything selected so far.
  const maxSimToSelected = embeddings.map((embedding) => {
    const similarity = cosineSimilarity(embedding, embeddings[0]);
    return Number.isNaN(similarity) ? 0 : similarity;
  });

  while (selected.length < k) {
    let bestIndex = -1;
    let bestScore = Number.NEGATIVE_INFINITY;

    for (let index = 0; index < relevance.length; index += 1) {
      if (isSelected[index]) {
        continue;
      }

      const score = lambda * relevance[index] - (1 - lambda) * maxSimToSelected[index];
      if (bestIndex < 0 || score > bestScore) {
        bestIndex = index;
        bestScore = score;
      }
    }

    selected.push(bestIndex);
    isSelected[bestIndex] = true;

    for (let index = 0; index < embeddings.length; index += 1) {
      const similarity = cosineSimilarity(embeddings[index], embeddings[bestIndex]);
      if (!Number.isNaN(similarity) && similarity > maxSimToSelected[index]) {
        maxSimToSelected[index] = similarity;
      }
    }
  }

  return selected;
}
