import type { LambdaDirection } from "../../shared/alchemy-schema";
import { LambdaValueError } from "../core/alchemy-errors";

/**
 * How a dimer perturbation is distributed over its two atoms. Atoms need no
 * policy.
 */
export type LambdaPolicy = {
  /** Apply the whole change to this atom index; the other must be unchanged. */
  specificAtom?: number | null;
  /** "counter": one atom gains what the other loses (e.g. CO -> BF). */
  direction?: LambdaDirection | null;
};

export interface LambdaCalculator {
  getLambdaValue(
    refAtomicNumbers: readonly number[],
    targetAtomicNumbers: readonly number[],
    policy?: LambdaPolicy,
  ): number;
  isCompatible(
    refAtomicNumbers: readonly number[],
    targetAtomicNumbers: readonly number[],
    policy?: LambdaPolicy,
  ): boolean;
}

const lambdaDetails = (ref: readonly number[], target: readonly number[]) => ({
  refAtomicNumbers: [...ref],
  targetAtomicNumbers: [...target],
});

function computeLambda(
  ref: readonly number[],
  target: readonly number[],
  policy: LambdaPolicy,
): number {
  if (ref.length !== target.length) {
    throw new LambdaValueError(
      `reference has ${ref.length} atom(s) but target has ${target.length}`,
      lambdaDetails(ref, target),
    );
  }
  if (ref.length === 1) {
    return target[0] - ref[0];
  }
  if (ref.length !== 2) {
    throw new LambdaValueError(`only atoms and dimers are supported, got ${ref.length} atoms`, lambdaDetails(ref, target));
  }

  const deltas = [target[0] - ref[0], target[1] - ref[1]];
  const { specificAtom, direction } = policy;
  if (specificAtom !== undefined && specificAtom !== null) {
    if (specificAtom !== 0 && specificAtom !== 1) {
      throw new LambdaValueError(`specific atom index ${specificAtom} is out of range`, lambdaDetails(ref, target));
    }
    const other = specificAtom === 0 ? 1 : 0;
    if (deltas[other] !== 0) {
      throw new LambdaValueError(
        `atom ${other} changes by ${deltas[other]}; it must be unchanged when the perturbation is applied to atom ${specificAtom}`,
        lambdaDetails(ref, target),
      );
    }
    return deltas[specificAtom];
  }
  if (direction === "counter") {
    if (deltas[0] !== -deltas[1]) {
      throw new LambdaValueError(
        `counter perturbation needs equal and opposite changes, got ${deltas[0]} and ${deltas[1]}`,
        lambdaDetails(ref, target),
      );
    }
    // Identical reference atoms: the second one gains charge. Otherwise the heavier one does.
    const gaining = ref[0] === ref[1] ? 1 : ref[0] > ref[1] ? 0 : 1;
    return deltas[gaining];
  }
  throw new LambdaValueError(
    "dimer perturbations need a specific atom or a direction",
    lambdaDetails(ref, target),
  );
}

export const geometricLambdaCalculator: LambdaCalculator = {
  getLambdaValue(refAtomicNumbers, targetAtomicNumbers, policy = {}) {
    return computeLambda(refAtomicNumbers, targetAtomicNumbers, policy);
  },

  isCompatible(refAtomicNumbers, targetAtomicNumbers, policy = {}) {
    try {
      computeLambda(refAtomicNumbers, targetAtomicNumbers, policy);
      return true;
    } catch (err) {
      if (err instanceof LambdaValueError) return false;
      throw err;
    }
  },
};
