export type AlchemyErrorCode =
  | "STATE_SELECTION"
  | "LAMBDA_VALUE"
  | "REFERENCE_CONSISTENCY"
  | "TAYLOR_ORDER"
  | "EQUILIBRIUM_FIT"
  | "PREDICTION_CONTRACT"
  | "ROW_VALIDATION";

export class AlchemyError extends Error {
  code: AlchemyErrorCode;
  details?: Record<string, unknown>;

  constructor(
    code: AlchemyErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AlchemyError";
    this.code = code;
    this.details = details;
  }
}

/** Fewer electronic states than the requested excitation level. */
export class StateSelectionError extends AlchemyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("STATE_SELECTION", message, details);
    this.name = "StateSelectionError";
  }
}

export class LambdaValueError extends AlchemyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("LAMBDA_VALUE", message, details);
    this.name = "LambdaValueError";
  }
}

/**
 * Initial and final references disagree (row counts after selection, or the
 * lambda needed to reach the target).
 */
export class ReferenceConsistencyError extends AlchemyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("REFERENCE_CONSISTENCY", message, details);
    this.name = "ReferenceConsistencyError";
  }
}

export class TaylorOrderError extends AlchemyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TAYLOR_ORDER", message, details);
    this.name = "TaylorOrderError";
  }
}

export class EquilibriumFitError extends AlchemyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("EQUILIBRIUM_FIT", message, details);
    this.name = "EquilibriumFitError";
  }
}

/** Caller passed a combination of options the predictor cannot honor. */
export class PredictionContractError extends AlchemyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PREDICTION_CONTRACT", message, details);
    this.name = "PredictionContractError";
  }
}

export class RowValidationError extends AlchemyError {
  issues: string[];

  constructor(message: string, issues: string[]) {
    super("ROW_VALIDATION", message, { issues });
    this.name = "RowValidationError";
    this.issues = issues;
  }
}
