// Environment switches for prediction defaults. Call options always win.

export const ALCHEMY_LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export type AlchemyLogLevel = (typeof ALCHEMY_LOG_LEVELS)[number];

export type AlchemyConfig = {
  atomBasisSet: string;
  dimerBasisSet: string;
  /** Samples on each side of the minimum used for the equilibrium fit. */
  fitPoints: number;
  fitOrder: number;
  zscoreCutoff: number;
  logLevel: AlchemyLogLevel;
};

export const DEFAULT_ALCHEMY_CONFIG: AlchemyConfig = {
  atomBasisSet: "aug-cc-pV5Z",
  dimerBasisSet: "cc-pV5Z",
  fitPoints: 2,
  fitOrder: 4,
  zscoreCutoff: 3.0,
  logLevel: "warn",
};

const clampPositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

const positiveNumber = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
};

const nonEmpty = (raw: string | undefined, fallback: string): string => {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
};

const parseLogLevel = (raw: string | undefined, fallback: AlchemyLogLevel): AlchemyLogLevel => {
  const normalized = raw?.trim().toLowerCase();
  const match = ALCHEMY_LOG_LEVELS.find((level) => level === normalized);
  return match ?? fallback;
};

export const readAlchemyConfig = (
  env: Record<string, string | undefined> = typeof process !== "undefined" ? process.env : {},
): AlchemyConfig => {
  return {
    atomBasisSet: nonEmpty(env.ALCHEMY_ATOM_BASIS_SET, DEFAULT_ALCHEMY_CONFIG.atomBasisSet),
    dimerBasisSet: nonEmpty(env.ALCHEMY_DIMER_BASIS_SET, DEFAULT_ALCHEMY_CONFIG.dimerBasisSet),
    fitPoints: clampPositiveInt(env.ALCHEMY_FIT_POINTS, DEFAULT_ALCHEMY_CONFIG.fitPoints),
    fitOrder: clampPositiveInt(env.ALCHEMY_FIT_ORDER, DEFAULT_ALCHEMY_CONFIG.fitOrder),
    zscoreCutoff: positiveNumber(env.ALCHEMY_ZSCORE_CUTOFF, DEFAULT_ALCHEMY_CONFIG.zscoreCutoff),
    logLevel: parseLogLevel(env.ALCHEMY_LOG_LEVEL, DEFAULT_ALCHEMY_CONFIG.logLevel),
  };
};
