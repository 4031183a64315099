import { describe, expect, it } from "vitest";
import type { AlchemyTables } from "../shared/alchemy-schema";
import { ReferenceConsistencyError } from "../modules/core/alchemy-errors";
import { getQaRefs, resolveReferencePair } from "../modules/alchemy/reference-resolver";
import {
  ATOM_BASIS,
  buildAtomTables,
  buildDimerTables,
  DIMER_BASIS,
  qatsRow,
} from "./helpers/alchemy-tables";

describe("getQaRefs", () => {
  const tables = buildAtomTables();

  it("returns other systems with the target electron count", () => {
    const refs = getQaRefs(tables, { targetLabel: "c", targetNElectrons: 6, basisSet: ATOM_BASIS });
    expect(refs.map((row) => `${row.system}:${row.charge}:${row.multiplicity}`)).toEqual([
      "b:-1:3",
      "b:-1:1",
      "n:1:3",
    ]);
  });

  it("reduces references to the requested state", () => {
    const refs = getQaRefs(tables, {
      targetLabel: "c",
      targetNElectrons: 6,
      basisSet: ATOM_BASIS,
      excitationLevel: 0,
    });
    expect(refs.map((row) => `${row.system}:${row.multiplicity}`)).toEqual(["b:3", "n:3"]);
  });

  it("reads the QC table when asked", () => {
    const refs = getQaRefs(tables, {
      targetLabel: "c",
      targetNElectrons: 6,
      basisSet: ATOM_BASIS,
      source: "qc",
    });
    expect(refs.map((row) => `${row.system}:${row.lambdaValue}`)).toEqual(["b:0", "b:1", "n:-1"]);
  });

  it("filters by basis set", () => {
    expect(getQaRefs(tables, { targetLabel: "c", targetNElectrons: 6, basisSet: "cc-pVDZ" })).toEqual([]);
  });

  it("drops dimer references the lambda policy cannot reach", () => {
    const dimers = buildDimerTables();
    const base = { targetLabel: "c.o", targetNElectrons: 14, basisSet: DIMER_BASIS, targetAtomicNumbers: [6, 8] };
    const counter = getQaRefs(dimers, { ...base, lambdaPolicy: { direction: "counter" } });
    expect(Array.from(new Set(counter.map((row) => row.system)))).toEqual(["n.n", "b.f"]);
    const firstAtom = getQaRefs(dimers, { ...base, lambdaPolicy: { specificAtom: 0 } });
    expect(firstAtom).toEqual([]);
  });
});

describe("resolveReferencePair", () => {
  it("keeps references that support both electron counts", () => {
    const tables = buildAtomTables();
    const pair = resolveReferencePair(tables, {
      targetLabel: "c",
      targetAtomicNumbers: [6],
      basisSet: ATOM_BASIS,
      initialNElectrons: 6,
      finalNElectrons: 5,
    });
    expect(pair.systems).toEqual(["b", "n"]);
    expect(pair.initial.get("b")?.map((row) => row.multiplicity)).toEqual([3]);
    expect(pair.final.get("b")?.map((row) => row.charge)).toEqual([0]);
  });

  it("drops references missing one endpoint instead of defaulting", () => {
    const tables = buildAtomTables();
    const pair = resolveReferencePair(
      { qc: tables.qc, qats: tables.qats.filter((row) => !(row.system === "n" && row.charge === 2)) },
      {
        targetLabel: "c",
        targetAtomicNumbers: [6],
        basisSet: ATOM_BASIS,
        initialNElectrons: 6,
        finalNElectrons: 5,
      },
    );
    expect(pair.systems).toEqual(["b"]);
  });

  it("drops references without the requested excited state", () => {
    const pair = resolveReferencePair(buildAtomTables(), {
      targetLabel: "c",
      targetAtomicNumbers: [6],
      basisSet: ATOM_BASIS,
      initialNElectrons: 6,
      finalNElectrons: 6,
      finalExcitation: 1,
    });
    expect(pair.systems).toEqual(["b"]);
    expect(pair.final.get("b")?.map((row) => row.multiplicity)).toEqual([1]);
  });

  it("keeps a fixed multiplicity instead of each reference's own ground state", () => {
    const pair = resolveReferencePair(buildAtomTables(), {
      targetLabel: "c",
      targetAtomicNumbers: [6],
      basisSet: ATOM_BASIS,
      initialNElectrons: 6,
      finalNElectrons: 5,
      initialMultiplicity: 1,
      finalMultiplicity: 2,
    });
    expect(pair.systems).toEqual(["b"]);
    expect(pair.initial.get("b")?.map((row) => row.multiplicity)).toEqual([1]);
  });

  it("fails when the endpoints keep different row counts", () => {
    const tables = buildAtomTables();
    const duplicated: AlchemyTables = {
      qc: tables.qc,
      qats: [
        ...tables.qats,
        qatsRow({ system: "b", atomicNumbers: [5], charge: 0, multiplicity: 2, polyCoeffs: [-24.6, -11.1, -1.4] }),
      ],
    };
    expect(() =>
      resolveReferencePair(duplicated, {
        targetLabel: "c",
        targetAtomicNumbers: [6],
        basisSet: ATOM_BASIS,
        initialNElectrons: 6,
        finalNElectrons: 5,
      }),
    ).toThrow(ReferenceConsistencyError);
  });
});
