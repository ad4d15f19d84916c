import { cosine, normalize } from './embedder.js';

export interface ChunkCluster {
  /** Chunk indices in arrival order. */
  members: number[];
  /** Normalized mean of the member vectors. */
  centroid: number[];
}

/**
 * Single pass over the chunks in order: each joins the most similar
 * existing cluster if its cosine to that centroid reaches the threshold,
 * else starts a new one. No target cluster count.
 */
export function clusterChunks(embeddings: readonly number[][], similarityThreshold: number): ChunkCluster[] {
  const clusters: Array<ChunkCluster & { sum: number[] }> = [];

  embeddings.forEach((vector, index) => {
    let best: (typeof clusters)[number] | undefined;
    let bestSimilarity = -Infinity;
    for (const cluster of clusters) {
      const similarity = cosine(vector, cluster.centroid);
      if (similarity > bestSimilarity) {
        best = cluster;
        bestSimilarity = similarity;
      }
    }

    if (best && bestSimilarity >= similarityThreshold) {
      best.members.push(index);
      best.sum = best.sum.map((x, i) => x + (vector[i] ?? 0));
      best.centroid = normalize(best.sum);
      return;
    }

    clusters.push({ members: [index], sum: [...vector], centroid: normalize(vector) });
  });

  return clusters.map(({ members, centroid }) => ({ members, centroid }));
}
