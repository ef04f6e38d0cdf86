import type { Story } from "@newsdesk/db";
import { cosineSimilarity } from "@newsdesk/search";

import { textOverlapSimilarity } from "./similarity.js";

export interface ClusterItem {
  id: number;
  title: string;
  content: string;
  vector?: readonly number[] | null;
}

export type SimilarityMethod = "cosine" | "text";

/**
 * One method for the whole batch, so every edge is judged on the same
 * scale: cosine when every item carries a vector, otherwise word overlap.
 */
export function chooseSimilarityMethod(items: readonly ClusterItem[]): SimilarityMethod {
  return items.every((item) => item.vector) ? "cosine" : "text";
}

export function pairSimilarity(
  a: ClusterItem,
  b: ClusterItem,
  method: SimilarityMethod
): number {
  if (method === "cosine" && a.vector && b.vector) {
    return cosineSimilarity(a.vector, b.vector);
  }
  return textOverlapSimilarity(`${a.title} ${a.content}`, `${b.title} ${b.content}`);
}

/** Symmetric N×N matrix with 1.0 on the diagonal. O(N²) time and memory. */
export function buildSimilarityMatrix(items: readonly ClusterItem[]): number[][] {
  const matrix = items.map(() => new Array<number>(items.length).fill(0));
  const method = chooseSimilarityMethod(items);

  for (let i = 0; i < items.length; i++) {
    const row = matrix[i];
    const itemA = items[i];
    if (!row || !itemA) continue;
    row[i] = 1.0;

    for (let j = i + 1; j < items.length; j++) {
      const itemB = items[j];
      const mirror = matrix[j];
      if (!itemB || !mirror) continue;
      const similarity = pairSimilarity(itemA, itemB, method);
      row[j] = similarity;
      mirror[i] = similarity;
    }
  }

  return matrix;
}

export function assertThreshold(threshold: number): void {
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new RangeError(`Similarity threshold must be within [0, 1], got ${threshold}`);
  }
}

/**
 * Labels nodes by connected component, where an edge joins i ≠ j when
 * similarity ≥ threshold. Nodes are visited in index order and labels
 * are contiguous from 0.
 */
export function connectedComponents(
  matrix: readonly (readonly number[])[],
  threshold: number
): number[] {
  const labels = new Array<number>(matrix.length).fill(-1);
  let nextLabel = 0;

  for (let start = 0; start < matrix.length; start++) {
    if (labels[start] !== -1) continue;

    const label = nextLabel++;
    labels[start] = label;
    const stack = [start];

    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined) break;
      const row = matrix[node] ?? [];

      for (let neighbor = 0; neighbor < matrix.length; neighbor++) {
        if (neighbor === node || labels[neighbor] !== -1) continue;
        if ((row[neighbor] ?? 0) >= threshold) {
          labels[neighbor] = label;
          stack.push(neighbor);
        }
      }
    }
  }

  return labels;
}

/** Longest `title + content`; ties go to the lowest id. */
export function selectRepresentative<T extends ClusterItem>(members: readonly T[]): T | null {
  let best: T | null = null;
  for (const member of members) {
    if (!best) {
      best = member;
      continue;
    }
    const length = member.title.length + member.content.length;
    const bestLength = best.title.length + best.content.length;
    if (length > bestLength || (length === bestLength && member.id < best.id)) {
      best = member;
    }
  }
  return best;
}

/**
 * Turns component labels into stories. `items` and `matrix` must share
 * the same index order.
 */
export function groupStories(
  items: readonly ClusterItem[],
  matrix: readonly (readonly number[])[],
  threshold: number
): Story[] {
  assertThreshold(threshold);
  if (matrix.length !== items.length) {
    throw new RangeError(
      `Similarity matrix has ${matrix.length} rows for ${items.length} items`
    );
  }

  const labels = connectedComponents(matrix, threshold);
  const clusters = new Map<number, ClusterItem[]>();
  items.forEach((item, index) => {
    const label = labels[index] ?? -1;
    const members = clusters.get(label);
    if (members) {
      members.push(item);
    } else {
      clusters.set(label, [item]);
    }
  });

  const stories: Story[] = [];
  for (const [label, members] of [...clusters.entries()].sort(([a], [b]) => a - b)) {
    const representative = selectRepresentative(members);
    if (!representative) continue;
    stories.push({
      storyId: label,
      representativeArticleId: representative.id,
      memberArticleIds: members.map((member) => member.id).sort((a, b) => a - b)
    });
  }
  return stories;
}

/**
 * Partitions articles into stories. Items are ordered by id first so the
 * labels do not depend on input order.
 */
export class SimilarityClusterer {
  constructor(private readonly threshold: number) {
    assertThreshold(threshold);
  }

  getThreshold(): number {
    return this.threshold;
  }

  deduplicate(items: readonly ClusterItem[]): Story[] {
    return deduplicate(items, this.threshold);
  }
}

export function deduplicate(items: readonly ClusterItem[], threshold: number): Story[] {
  assertThreshold(threshold);
  if (items.length === 0) {
    return [];
  }

  const ordered = [...items].sort((a, b) => a.id - b.id);
  return groupStories(ordered, buildSimilarityMatrix(ordered), threshold);
}
