import { DimensionError, add, fromFunction, matrix, mult, numberScalar, trace } from '@shapemat/core';

function main(): void {
  const options = { scalar: numberScalar };

  const a = matrix(
    [
      [1, 2, 3],
      [4, 5, 6],
    ] as const,
    options,
  );

  // Mismatched shapes are compile errors. Each of these lines is rejected
  // by tsc with the message shown:
  //
  //   mult(a, a);
  //           ^ error: [Matrix ❌] Cannot multiply 2×3 by 2×3. The column count of
  //             the left operand (3) must equal the row count of the right operand (2)
  //
  //   add(a, a.T);
  //          ^ error: [Matrix ❌] Cannot add matrices of shapes 2×3 and 3×2.
  //             Both operands must have the same shape
  //
  //   trace(a);
  //         ^ error: [Matrix ❌] Cannot take the trace of a 2×3 matrix. The matrix must be square
  //
  //   matrix([[1, 2], [3]] as const, options);
  //          ^ error: [Matrix ❌] Every row must have the same number of elements

  console.log('a · aᵀ is fine:', mult(a, a.T).format());

  // Shapes that are only known at runtime are typed with `number`
  // dimensions. The compiler cannot check them, so the same contracts are
  // checked when the operation runs.
  const rows = Number(process.argv[2] ?? '3');
  const dynamic = fromFunction([rows, 2] as const, (i, j) => i + j, options);

  try {
    add(dynamic, fromFunction([2, rows] as const, () => 0, options));
  } catch (error) {
    if (!(error instanceof DimensionError)) {
      throw error;
    }
    console.log(`${error.name} in ${error.operation}: ${error.message}`);
    // DimensionError in add: Cannot add matrices of shapes 3×2 and 2×3
  }

  try {
    trace(dynamic);
  } catch (error) {
    if (!(error instanceof DimensionError)) {
      throw error;
    }
    console.log(`${error.name} in ${error.operation}: ${error.message}`);
    // DimensionError in trace: Cannot take the trace of non-square matrix 3×2
  }
}

main();
