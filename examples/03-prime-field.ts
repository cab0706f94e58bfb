import { bn254, dotProduct, identity, matrix, matVec, mult, primeField, scalarMult } from '@shapemat/core';

function main(): void {
  // Arithmetic modulo 7; elements are canonical bigints in [0, 7)
  const f7 = primeField(7n);
  const options = { scalar: f7 };

  const a = matrix(
    [
      [3n, 5n],
      [6n, 1n],
    ] as const,
    options,
  );

  console.log(a.toString());
  console.log('a · a =');
  console.log(mult(a, a).format()); // [[4, 6], [3, 3]]
  console.log('4 · a =');
  console.log(scalarMult(a, 4n).format()); // [[5, 6], [3, 4]]

  // det(a) = 3 - 30 = -27 ≡ 1, so the adjugate is the inverse
  const inverse = matrix(
    [
      [f7.element(1), f7.element(-5)],
      [f7.element(-6), f7.element(3)],
    ] as const,
    options,
  );
  console.log('a · a⁻¹ = I:', mult(a, inverse).equals(identity(2, options)));

  // The BN254 scalar field, as used by common proving systems
  const witness = [bn254.element(3), bn254.neg(1n), bn254.inv(2n)] as const;
  const weights = [bn254.one(), bn254.element(2), bn254.element(4)] as const;
  console.log('⟨w, x⟩ =', bn254.format(dotProduct(weights, witness, bn254))); // 3

  const constraints = identity(3, { scalar: bn254 }).scale(bn254.element(5));
  console.log('5I · x =', matVec(constraints, witness).map((x) => bn254.format(x)));
}

main();
