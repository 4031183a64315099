import type {
  AlchemyTables,
  QatsRow,
  QuantumChemistryRow,
  SystemIdentity,
} from "../../shared/alchemy-schema";
import { ReferenceConsistencyError } from "../core/alchemy-errors";
import { createAlchemyLogger } from "../core/alchemy-log";
import { resolveCapabilities, type AlchemyCapabilities } from "./capabilities";
import type { LambdaPolicy } from "./lambda-value";
import { groupBySystem } from "./rows";

const log = createAlchemyLogger("refs");

export type ReferenceSource = "qats" | "qc";

export type QaRefsOptions = {
  targetLabel: string;
  targetNElectrons: number;
  basisSet: string;
  /**
   * When given, references must have the same number of atoms and be
   * reachable under `lambdaPolicy`.
   */
  targetAtomicNumbers?: readonly number[];
  lambdaPolicy?: LambdaPolicy;
  /** Reduce each reference to this electronic state; null keeps every state. */
  excitationLevel?: number | null;
  ignoreOneRow?: boolean;
  capabilities?: Partial<AlchemyCapabilities>;
};

function filterReferences<R extends SystemIdentity>(
  rows: readonly R[],
  opts: QaRefsOptions,
  capabilities: AlchemyCapabilities,
): R[] {
  const target = opts.targetAtomicNumbers;
  const reachable = new Map<string, boolean>();
  return rows.filter((row) => {
    if (row.system === opts.targetLabel) return false;
    if (row.nElectrons !== opts.targetNElectrons) return false;
    if (row.basisSet !== opts.basisSet) return false;
    if (!target) return true;
    if (row.atomicNumbers.length !== target.length) return false;
    const key = `${row.system}|${row.atomicNumbers.join(",")}`;
    let ok = reachable.get(key);
    if (ok === undefined) {
      ok = capabilities.lambdaCalculator.isCompatible(row.atomicNumbers, target, opts.lambdaPolicy);
      reachable.set(key, ok);
    }
    return ok;
  });
}

/**
 * Rows of every other system with the target's electron count. References are
 * indexed by electron count, not charge, since they usually carry a different
 * charge than the target.
 */
export function getQaRefs(
  tables: AlchemyTables,
  opts: QaRefsOptions & { source: "qc" },
): QuantumChemistryRow[];
export function getQaRefs(
  tables: AlchemyTables,
  opts: QaRefsOptions & { source?: "qats" },
): QatsRow[];
export function getQaRefs(
  tables: AlchemyTables,
  opts: QaRefsOptions & { source?: ReferenceSource },
): QuantumChemistryRow[] | QatsRow[] {
  const capabilities = resolveCapabilities(opts.capabilities);
  const level = opts.excitationLevel ?? null;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  if (opts.source === "qc") {
    const refs = filterReferences(tables.qc, opts, capabilities);
    return level === null ? refs : capabilities.stateSelector.selectState(refs, level, ignoreOneRow);
  }
  const refs = filterReferences(tables.qats, opts, capabilities);
  return level === null ? refs : capabilities.stateSelector.selectState(refs, level, ignoreOneRow);
}

export type ReferencePairOptions = {
  targetLabel: string;
  targetAtomicNumbers: readonly number[];
  basisSet: string;
  initialNElectrons: number;
  finalNElectrons: number;
  initialExcitation?: number;
  finalExcitation?: number;
  /**
   * Keep only reference rows with this multiplicity instead of selecting each
   * reference's own state. Dimers pass the target's ground multiplicities.
   */
  initialMultiplicity?: number;
  finalMultiplicity?: number;
  lambdaPolicy?: LambdaPolicy;
  ignoreOneRow?: boolean;
  capabilities?: Partial<AlchemyCapabilities>;
};

export type ReferencePair = {
  /** Sorted labels of references usable for both endpoints. */
  systems: string[];
  initial: Map<string, QatsRow[]>;
  final: Map<string, QatsRow[]>;
};

const intersectLabels = (a: Iterable<string>, b: ReadonlySet<string>): Set<string> => {
  const shared = new Set<string>();
  for (const label of a) {
    if (b.has(label)) shared.add(label);
  }
  return shared;
};

/**
 * QATS references that support both the initial and the final electron count
 * of a target, each reduced to its requested electronic state (or to a fixed
 * multiplicity when one is given). References missing either endpoint are
 * dropped. A system whose two endpoints keep a
 * different number of rows after selection raises ReferenceConsistencyError.
 */
export function resolveReferencePair(
  tables: AlchemyTables,
  opts: ReferencePairOptions,
): ReferencePair {
  const capabilities = resolveCapabilities(opts.capabilities);
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const base = {
    targetLabel: opts.targetLabel,
    basisSet: opts.basisSet,
    targetAtomicNumbers: opts.targetAtomicNumbers,
    lambdaPolicy: opts.lambdaPolicy,
    excitationLevel: null,
    capabilities,
  };
  const initialCandidates = getQaRefs(tables, { ...base, targetNElectrons: opts.initialNElectrons });
  const finalCandidates = getQaRefs(tables, { ...base, targetNElectrons: opts.finalNElectrons });

  const candidateLabels = intersectLabels(
    initialCandidates.map((row) => row.system),
    new Set(finalCandidates.map((row) => row.system)),
  );

  const selectEndpoint = (
    candidates: readonly QatsRow[],
    excitation: number | undefined,
    multiplicity: number | undefined,
  ): Map<string, QatsRow[]> => {
    const shared = candidates.filter((row) => candidateLabels.has(row.system));
    if (multiplicity !== undefined) {
      return groupBySystem(shared.filter((row) => row.multiplicity === multiplicity));
    }
    return groupBySystem(capabilities.stateSelector.selectState(shared, excitation ?? 0, ignoreOneRow));
  };
  const initial = selectEndpoint(initialCandidates, opts.initialExcitation, opts.initialMultiplicity);
  const final = selectEndpoint(finalCandidates, opts.finalExcitation, opts.finalMultiplicity);

  const systems = Array.from(intersectLabels(initial.keys(), new Set(final.keys()))).sort();
  const dropped = Array.from(candidateLabels).filter((label) => !systems.includes(label));
  if (dropped.length > 0) {
    log.debug("references without the requested states were dropped", {
      target: opts.targetLabel,
      dropped: dropped.sort(),
    });
  }

  for (const system of systems) {
    const nInitial = initial.get(system)?.length ?? 0;
    const nFinal = final.get(system)?.length ?? 0;
    if (nInitial !== nFinal) {
      throw new ReferenceConsistencyError(
        `reference ${system} has ${nInitial} initial-state row(s) but ${nFinal} final-state row(s)`,
        { target: opts.targetLabel, reference: system, nInitial, nFinal },
      );
    }
  }

  return {
    systems,
    initial: new Map(systems.map((system) => [system, initial.get(system) ?? []])),
    final: new Map(systems.map((system) => [system, final.get(system) ?? []])),
  };
}
