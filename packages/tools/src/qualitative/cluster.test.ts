import { describe, it, expect } from 'vitest';
import { clusterChunks } from './cluster.js';

describe('clusterChunks', () => {
  it('joins chunks to the nearest centroid above the threshold', () => {
    const clusters = clusterChunks([[1, 0], [0.9, 0.1], [0, 1], [0.1, 0.9]], 0.35);
    expect(clusters.map(c => c.members)).toEqual([[0, 1], [2, 3]]);
  });

  it('starts a new cluster for every chunk below the threshold', () => {
    const clusters = clusterChunks([[1, 0], [0, 1]], 0.35);
    expect(clusters.map(c => c.members)).toEqual([[0], [1]]);
  });

  it('never joins zero vectors', () => {
    expect(clusterChunks([[0, 0], [0, 0]], 0.35)).toHaveLength(2);
  });

  it('returns normalized centroids', () => {
    const [cluster] = clusterChunks([[2, 0], [4, 0]], 0.35);
    expect(cluster?.centroid).toEqual([1, 0]);
  });
});
