import { z } from "zod";
import {
  isQatsRow,
  qatsRecordSchema,
  quantumChemistryRecordSchema,
  type AlchemyRow,
  type QatsRow,
  type QuantumChemistryRow,
} from "../../shared/alchemy-schema";
import { RowValidationError } from "../core/alchemy-errors";

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(record)";
    return `${where}: ${issue.message}`;
  });

export function parseQuantumChemistryRows(raw: unknown): QuantumChemistryRow[] {
  const parsed = z.array(quantumChemistryRecordSchema).safeParse(raw);
  if (!parsed.success) {
    throw new RowValidationError(
      "quantum chemistry table failed validation",
      formatIssues(parsed.error),
    );
  }
  return parsed.data;
}

export function parseQatsRows(raw: unknown): QatsRow[] {
  const parsed = z.array(qatsRecordSchema).safeParse(raw);
  if (!parsed.success) {
    throw new RowValidationError("QATS table failed validation", formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Energy used to rank electronic states. */
export const stateEnergy = (row: AlchemyRow): number =>
  isQatsRow(row) ? row.polyCoeffs[0] : row.electronicEnergy;

export function groupBySystem<R extends AlchemyRow>(rows: readonly R[]): Map<string, R[]> {
  const groups = new Map<string, R[]>();
  for (const row of rows) {
    const group = groups.get(row.system);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.system, [row]);
    }
  }
  return groups;
}

export type QcQuery = {
  system?: string;
  charge?: number;
  multiplicity?: number;
  nElectrons?: number;
  basisSet?: string;
  lambdaValue?: number;
  bondLength?: number;
};

export function queryQc(
  rows: readonly QuantumChemistryRow[],
  query: QcQuery,
): QuantumChemistryRow[] {
  return rows.filter(
    (row) =>
      (query.system === undefined || row.system === query.system) &&
      (query.charge === undefined || row.charge === query.charge) &&
      (query.multiplicity === undefined || row.multiplicity === query.multiplicity) &&
      (query.nElectrons === undefined || row.nElectrons === query.nElectrons) &&
      (query.basisSet === undefined || row.basisSet === query.basisSet) &&
      (query.lambdaValue === undefined || row.lambdaValue === query.lambdaValue) &&
      (query.bondLength === undefined || row.bondLength === query.bondLength),
  );
}
