/**
 * Descriptive statistics over plain number arrays
 */

export interface SummaryStats {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
  /** Population standard deviation */
  std: number;
}

/**
 * Summary of a sample, or null when it is empty.
 */
export function summarize(values: readonly number[]): SummaryStats | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = sorted.reduce((sum, v) => sum + v, 0) / count;
  const mid = Math.floor(count / 2);
  const median = count % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
  const variance = sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / count;

  return {
    count,
    mean,
    median,
    min: sorted[0],
    max: sorted[count - 1],
    std: Math.sqrt(variance),
  };
}

export function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Pairwise dot products: `matrix[i][j] = vectors[i] · vectors[j]`.
 */
export function relationMatrix(vectors: readonly (readonly number[])[]): number[][] {
  const matrix: number[][] = vectors.map(() => new Array<number>(vectors.length).fill(0));
  for (let i = 0; i < vectors.length; i++) {
    for (let j = i; j < vectors.length; j++) {
      const value = dot(vectors[i], vectors[j]);
      matrix[i][j] = value;
      matrix[j][i] = value;
    }
  }
  return matrix;
}

/**
 * All entries of a matrix in row order.
 */
export function flatten(matrix: readonly (readonly number[])[]): number[] {
  return matrix.flatMap((row) => [...row]);
}
