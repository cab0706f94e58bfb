import {
  add,
  dotProduct,
  matrix,
  mult,
  numberScalar,
  scalarMult,
  sub,
  trace,
  transpose,
  zeros,
} from '@shapemat/core';

function main(): void {
  const options = { scalar: numberScalar };

  // Shapes are inferred from the literals: Matrix<2, 3, number>
  const a = matrix(
    [
      [1, 2, 3],
      [4, 5, 6],
    ] as const,
    options,
  );

  // Matrix<3, 2, number>
  const b = matrix(
    [
      [7, 8],
      [9, 10],
      [11, 12],
    ] as const,
    options,
  );

  console.log(a.toString());
  console.log(b.toString());

  // (2×3) · (3×2) → Matrix<2, 2, number>
  const product = mult(a, b);
  console.log('a · b =');
  console.log(product.format()); // [[ 58,  64], [139, 154]]

  console.log('aᵀ =');
  console.log(transpose(a).format()); // [[1, 4], [2, 5], [3, 6]]

  console.log('a + a - 3a =');
  console.log(sub(add(a, a), scalarMult(a, 3)).format());

  console.log('trace(a · b) =', trace(product)); // 212
  console.log('[1, 2, 3] · [4, 5, 6] =', dotProduct([1, 2, 3] as const, [4, 5, 6] as const, numberScalar)); // 32

  // Method forms read left to right
  const gram = a.mult(a.T);
  console.log('a · aᵀ =');
  console.log(gram.format());
  console.log('is zero:', gram.equals(zeros([2, 2] as const, options)));
}

main();
