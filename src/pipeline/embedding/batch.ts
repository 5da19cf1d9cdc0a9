import { DimensionMismatchError } from '../errors';

export function assertDimensions(vectors: readonly number[][], dimension: number, model: string): void {
  for (const v of vectors) {
    if (v.length !== dimension) throw new DimensionMismatchError(dimension, v.length, model);
  }
}

/** Split texts into batches of at most size, call fn per batch, concatenate in order. */
export async function inBatches(
  texts: readonly string[],
  size: number,
  fn: (batch: string[]) => Promise<number[][]>
): Promise<number[][]> {
  const out: number[][] = [];
  for (let i = 0; i < texts.length; i += size) {
    out.push(...(await fn(texts.slice(i, i + size))));
  }
  return out;
}
