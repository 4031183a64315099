import type { PredictionMode } from "../../shared/alchemy-schema";
import { PredictionContractError, StateSelectionError } from "../core/alchemy-errors";
import type { AlchemyCapabilities } from "./capabilities";

export type PredictionOutcome =
  | { status: "ok"; value: number }
  | { status: "no-data"; reason: string };

export const okOutcome = (value: number): PredictionOutcome => ({ status: "ok", value });

export const noData = (reason: string): PredictionOutcome => ({ status: "no-data", reason });

/** Collapses an outcome to the NaN sentinel used by tabular reports. */
export const toNumber = (outcome: PredictionOutcome): number =>
  outcome.status === "ok" ? outcome.value : Number.NaN;

/**
 * One reference system's contribution. `predictions` is indexed by Taylor
 * order for "qats" and "qats-vs-qa", and holds a single value for "qa".
 */
export interface ReferencePrediction {
  reference: string;
  /** Lambda taking the reference to the target. */
  perturbation: number;
  mode: PredictionMode;
  predictions: number[];
}

export const predictionsByReference = (
  predictions: readonly ReferencePrediction[],
): Record<string, number[]> =>
  Object.fromEntries(predictions.map((entry) => [entry.reference, [...entry.predictions]]));

export type CommonPredictionOptions = {
  basisSet?: string;
  /** Tolerate targets or references with a single computed state. Defaults to true. */
  ignoreOneRow?: boolean;
  capabilities?: Partial<AlchemyCapabilities>;
};

export type AlchemyModeOptions = {
  mode?: PredictionMode;
  /** Only references reached with one of these lambdas are reported; null allows all. */
  consideredLambdas?: readonly number[] | null;
};

export type ChargeChangeOptions = CommonPredictionOptions & {
  targetLabel: string;
  /** Change in charge from the initial state; +1 removes an electron. */
  deltaCharge: number;
  targetInitialCharge?: number;
  /** Negate every difference (electron affinities). */
  changeSigns?: boolean;
};

export function assertChargeChange(deltaCharge: number, changeSigns: boolean): void {
  if (!Number.isInteger(deltaCharge) || deltaCharge === 0) {
    throw new PredictionContractError(`deltaCharge must be a non-zero integer, got ${deltaCharge}`);
  }
  if (deltaCharge < 0 && !changeSigns) {
    throw new PredictionContractError(
      "adding electrons (deltaCharge < 0) reports with changeSigns so it matches the ionization convention",
      { deltaCharge },
    );
  }
}

export const isLambdaConsidered = (
  lambda: number,
  consideredLambdas: readonly number[] | null | undefined,
): boolean => consideredLambdas == null || consideredLambdas.includes(lambda);

export function exactlyOne<R>(rows: readonly R[], what: string): R {
  if (rows.length !== 1) {
    throw new StateSelectionError(`expected exactly one row for ${what}, got ${rows.length}`, {
      rows: rows.length,
    });
  }
  return rows[0];
}
