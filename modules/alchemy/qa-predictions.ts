import type { AlchemyTables } from "../../shared/alchemy-schema";
import { readAlchemyConfig } from "../core/alchemy-config";
import { PredictionContractError, ReferenceConsistencyError } from "../core/alchemy-errors";
import { resolveCapabilities } from "./capabilities";
import {
  noData,
  okOutcome,
  type CommonPredictionOptions,
  type PredictionOutcome,
} from "./prediction-types";
import { queryQc } from "./rows";

export type QaPredictionOptions = CommonPredictionOptions & {
  refLabel: string;
  refCharge: number;
  excitationLevel?: number;
  lambdaValues?: number | readonly number[];
  /** Required for dimers. */
  bondLength?: number;
};

/**
 * Energies of a reference state perturbed to each lambda, read from the
 * computed alchemical points. One outcome per lambda, in input order.
 */
export function qaPredictions(
  tables: Pick<AlchemyTables, "qc">,
  opts: QaPredictionOptions,
): PredictionOutcome[] {
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().atomBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const requested = opts.lambdaValues ?? [-1, 0, 1];
  const lambdas = typeof requested === "number" ? [requested] : requested;

  let rows = queryQc(tables.qc, { system: opts.refLabel, charge: opts.refCharge, basisSet });
  if (rows.length > 0 && rows[0].atomicNumbers.length === 2) {
    if (opts.bondLength === undefined) {
      throw new PredictionContractError(`${opts.refLabel} is a dimer; a bond length is required`);
    }
    rows = rows.filter((row) => row.bondLength === opts.bondLength);
  }
  rows = rows.filter((row) => lambdas.includes(row.lambdaValue));
  if (rows.length === 0) {
    return lambdas.map((lambda) =>
      noData(`no ${basisSet} data for ${opts.refLabel} at charge ${opts.refCharge} and lambda ${lambda}`),
    );
  }

  const multiplicity = capabilities.stateSelector.getMultiplicity(
    rows,
    opts.excitationLevel ?? 0,
    ignoreOneRow,
  );
  if (multiplicity === null) {
    return lambdas.map(() =>
      noData(`${opts.refLabel} at charge ${opts.refCharge} has no excitation level ${opts.excitationLevel ?? 0}`),
    );
  }

  return lambdas.map((lambda) => {
    const matches = rows.filter(
      (row) => row.multiplicity === multiplicity && row.lambdaValue === lambda,
    );
    if (matches.length === 0) {
      return noData(`${opts.refLabel} has no multiplicity ${multiplicity} point at lambda ${lambda}`);
    }
    if (matches.length > 1) {
      throw new ReferenceConsistencyError(
        `${matches.length} rows for ${opts.refLabel} (multiplicity ${multiplicity}) at lambda ${lambda}`,
        { reference: opts.refLabel, lambda },
      );
    }
    return okOutcome(matches[0].electronicEnergy);
  });
}
