import { z } from "zod";

export const lambdaDirectionSchema = z.enum(["counter"]);
export type LambdaDirection = z.infer<typeof lambdaDirectionSchema>;

export const predictionModeSchema = z.enum(["qats", "qa", "qats-vs-qa"]);
export type PredictionMode = z.infer<typeof predictionModeSchema>;

const atomicNumbersSchema = z
  .array(z.number().int().positive())
  .min(1)
  .max(2);

// Raw records use the dataset column names; rows are camel-cased after parsing.
const identityShape = {
  system: z.string().min(1),
  atomic_numbers: atomicNumbersSchema,
  charge: z.number().int(),
  multiplicity: z.number().int().positive(),
  n_electrons: z.number().int().nonnegative(),
  basis_set: z.string().min(1),
  bond_length: z.number().positive().nullish(),
};

type RawIdentity = {
  system: string;
  atomic_numbers: number[];
  charge: number;
  n_electrons: number;
  bond_length?: number | null;
};

const checkIdentity = (record: RawIdentity, ctx: z.RefinementCtx) => {
  const nuclear = record.atomic_numbers.reduce((sum, value) => sum + value, 0);
  if (nuclear - record.charge !== record.n_electrons) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["n_electrons"],
      message: `n_electrons ${record.n_electrons} does not match atomic numbers and charge (${nuclear - record.charge}) for ${record.system}`,
    });
  }
  if (record.atomic_numbers.length === 2 && record.bond_length == null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["bond_length"],
      message: `dimer ${record.system} is missing bond_length`,
    });
  }
};

export const quantumChemistryRecordSchema = z
  .object({
    ...identityShape,
    lambda_value: z.number().int(),
    electronic_energy: z.number().finite(),
  })
  .superRefine(checkIdentity)
  .transform((record) => ({
    system: record.system,
    atomicNumbers: record.atomic_numbers,
    charge: record.charge,
    multiplicity: record.multiplicity,
    nElectrons: record.n_electrons,
    basisSet: record.basis_set,
    lambdaValue: record.lambda_value,
    bondLength: record.bond_length ?? undefined,
    electronicEnergy: record.electronic_energy,
  }));

export const qatsRecordSchema = z
  .object({
    ...identityShape,
    poly_coeffs: z.array(z.number().finite()).min(1),
  })
  .superRefine(checkIdentity)
  .transform((record) => ({
    system: record.system,
    atomicNumbers: record.atomic_numbers,
    charge: record.charge,
    multiplicity: record.multiplicity,
    nElectrons: record.n_electrons,
    basisSet: record.basis_set,
    bondLength: record.bond_length ?? undefined,
    polyCoeffs: record.poly_coeffs,
  }));

export type QuantumChemistryRecord = z.input<typeof quantumChemistryRecordSchema>;
export type QatsRecord = z.input<typeof qatsRecordSchema>;

export interface SystemIdentity {
  system: string;
  atomicNumbers: number[];
  charge: number;
  multiplicity: number;
  nElectrons: number;
  basisSet: string;
  /** Angstroms; only set for dimers. */
  bondLength?: number;
}

export interface QuantumChemistryRow extends SystemIdentity {
  lambdaValue: number;
  /** Hartree. */
  electronicEnergy: number;
}

export interface QatsRow extends SystemIdentity {
  /** Increasing degree; index 0 is the lambda = 0 energy. */
  polyCoeffs: number[];
}

export type AlchemyRow = QuantumChemistryRow | QatsRow;

export interface AlchemyTables {
  qc: readonly QuantumChemistryRow[];
  qats: readonly QatsRow[];
}

export const isQatsRow = (row: AlchemyRow): row is QatsRow => "polyCoeffs" in row;
