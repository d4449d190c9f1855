/**
 * Dynamic Time Warping
 *
 * Classic O(|A|·|B|) dynamic program over the cumulative-cost matrix
 *
 *   D(i, j) = |A[i] - B[j]| + min(D(i-1, j), D(i, j-1), D(i-1, j-1))
 *
 * with D(0, 0) = |A[0] - B[0]| and the first row and column accumulated
 * along the matrix edges.
 *
 * Backtracking from (|A|, |B|) picks the cheapest predecessor. Ties are
 * broken in a fixed order so paths are reproducible:
 *   1. diagonal   (i-1, j-1)
 *   2. vertical   (i-1, j)    steps back in the reference
 *   3. horizontal (i, j-1)    steps back in the target
 */

import type { AlignmentPath } from "@velopick/contracts";

/**
 * Cumulative-cost matrix, row-major: entry (i, j) at i * cols + j.
 */
export interface CostMatrix {
  rows: number;
  cols: number;
  values: Float64Array;
}

export function cumulativeCost(
  reference: readonly number[],
  target: readonly number[]
): CostMatrix {
  const rows = reference.length;
  const cols = target.length;
  if (rows === 0 || cols === 0) {
    throw new RangeError(
      `Cannot align empty sequences (reference ${rows}, target ${cols})`
    );
  }

  const values = new Float64Array(rows * cols);
  values[0] = Math.abs(reference[0] - target[0]);

  for (let j = 1; j < cols; j++) {
    values[j] = Math.abs(reference[0] - target[j]) + values[j - 1];
  }

  for (let i = 1; i < rows; i++) {
    const row = i * cols;
    const prev = row - cols;
    const a = reference[i];
    values[row] = Math.abs(a - target[0]) + values[prev];
    for (let j = 1; j < cols; j++) {
      values[row + j] =
        Math.abs(a - target[j]) +
        Math.min(values[prev + j], values[row + j - 1], values[prev + j - 1]);
    }
  }

  return { rows, cols, values };
}

function backtrack(matrix: CostMatrix): AlignmentPath {
  const { cols, values } = matrix;
  let i = matrix.rows - 1;
  let j = cols - 1;

  const referenceIndices: number[] = [i + 1];
  const targetIndices: number[] = [j + 1];

  while (i > 0 || j > 0) {
    if (i === 0) {
      j--;
    } else if (j === 0) {
      i--;
    } else {
      const diagonal = values[(i - 1) * cols + (j - 1)];
      const vertical = values[(i - 1) * cols + j];
      const horizontal = values[i * cols + (j - 1)];
      if (diagonal <= vertical && diagonal <= horizontal) {
        i--;
        j--;
      } else if (vertical <= horizontal) {
        i--;
      } else {
        j--;
      }
    }
    referenceIndices.push(i + 1);
    targetIndices.push(j + 1);
  }

  referenceIndices.reverse();
  targetIndices.reverse();

  return {
    referenceIndices,
    targetIndices,
    cost: values[matrix.rows * cols - 1],
  };
}

/**
 * Optimal warping path between `reference` (A) and `target` (B).
 *
 * @returns 1-based index pairs from (1, 1) to (|A|, |B|) and the total
 * accumulated cost
 * @throws RangeError if either sequence is empty
 */
export function dtw(
  reference: readonly number[],
  target: readonly number[]
): AlignmentPath {
  return backtrack(cumulativeCost(reference, target));
}
