import { isQatsRow, type AlchemyRow } from "../../shared/alchemy-schema";
import { StateSelectionError } from "../core/alchemy-errors";
import { groupBySystem, stateEnergy } from "./rows";

/**
 * Picks electronic states out of rows that share system, charge and basis set
 * but differ in multiplicity.
 */
export interface StateSelector {
  /**
   * Rows of the `excitationLevel`-th state for every system present. Curves
   * keep all of the selected state's rows. Systems lacking the state are
   * dropped when `ignoreOneRow` is set.
   */
  selectState<R extends AlchemyRow>(
    rows: readonly R[],
    excitationLevel: number,
    ignoreOneRow: boolean,
  ): R[];
  /** Multiplicity of the selected state of a single system, or null when it has no such state. */
  getMultiplicity(
    rows: readonly AlchemyRow[],
    excitationLevel: number,
    ignoreOneRow: boolean,
  ): number | null;
}

type RankedState = { multiplicity: number; energy: number };

/**
 * Distinct multiplicities ordered by ascending energy. Perturbed QC rows
 * (lambda != 0) do not vote when unperturbed rows exist, and curves are
 * represented by their lowest sample.
 */
export function rankStates(rows: readonly AlchemyRow[]): RankedState[] {
  const unperturbed = rows.filter((row) => isQatsRow(row) || row.lambdaValue === 0);
  const voting = unperturbed.length > 0 ? unperturbed : rows;
  const lowest = new Map<number, number>();
  for (const row of voting) {
    const energy = stateEnergy(row);
    const current = lowest.get(row.multiplicity);
    if (current === undefined || energy < current) {
      lowest.set(row.multiplicity, energy);
    }
  }
  return Array.from(lowest, ([multiplicity, energy]) => ({ multiplicity, energy })).sort(
    (a, b) => a.energy - b.energy || a.multiplicity - b.multiplicity,
  );
}

const pickMultiplicity = (
  system: string,
  rows: readonly AlchemyRow[],
  excitationLevel: number,
  ignoreOneRow: boolean,
): number | null => {
  if (!Number.isInteger(excitationLevel) || excitationLevel < 0) {
    throw new StateSelectionError(`excitation level must be a non-negative integer, got ${excitationLevel}`, {
      system,
      excitationLevel,
    });
  }
  const states = rankStates(rows);
  if (excitationLevel < states.length) {
    return states[excitationLevel].multiplicity;
  }
  if (!ignoreOneRow) {
    throw new StateSelectionError(
      `${system} has ${states.length} electronic state(s); excitation level ${excitationLevel} is not available`,
      { system, available: states.map((state) => state.multiplicity), excitationLevel },
    );
  }
  return null;
};

export const energyOrderedStateSelector: StateSelector = {
  selectState<R extends AlchemyRow>(
    rows: readonly R[],
    excitationLevel: number,
    ignoreOneRow: boolean,
  ): R[] {
    const selected: R[] = [];
    for (const [system, group] of groupBySystem(rows)) {
      const multiplicity = pickMultiplicity(system, group, excitationLevel, ignoreOneRow);
      if (multiplicity === null) continue;
      for (const row of group) {
        if (row.multiplicity === multiplicity) selected.push(row);
      }
    }
    return selected;
  },

  getMultiplicity(rows, excitationLevel, ignoreOneRow) {
    if (rows.length === 0) {
      throw new StateSelectionError("cannot select a state from an empty row set", { excitationLevel });
    }
    const systems = new Set(rows.map((row) => row.system));
    if (systems.size > 1) {
      throw new StateSelectionError(
        `multiplicity lookup expects a single system, got ${Array.from(systems).sort().join(", ")}`,
        { excitationLevel },
      );
    }
    return pickMultiplicity(rows[0].system, rows, excitationLevel, ignoreOneRow);
  },
};
