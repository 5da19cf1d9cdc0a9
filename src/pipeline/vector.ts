import type { DistanceMetric } from './types';

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 1;
  return 1 - dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function l2Distance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

export function distance(a: readonly number[], b: readonly number[], metric: DistanceMetric): number {
  return metric === 'cosine' ? cosineDistance(a, b) : l2Distance(a, b);
}

/** Map a distance to a similarity where higher is better: 1-d for cosine, 1/(1+d) for l2. */
export function toSimilarity(d: number, metric: DistanceMetric): number {
  return metric === 'cosine' ? 1 - d : 1 / (1 + d);
}

/** pgvector text literal, e.g. "[0.1,0.2]" */
export function toVectorLiteral(v: readonly number[]): string {
  return `[${v.join(',')}]`;
}

export function parseVectorLiteral(text: string): number[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed) || !parsed.every((x) => typeof x === 'number')) return null;
  return parsed;
}
