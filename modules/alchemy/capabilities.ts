import { geometricLambdaCalculator, type LambdaCalculator } from "./lambda-value";
import { leastSquaresPolynomialFitter, type PolynomialFitter } from "./poly-fit";
import { energyOrderedStateSelector, type StateSelector } from "./state-selection";

/** Services the predictors consume as black boxes; any of them can be replaced per call. */
export interface AlchemyCapabilities {
  stateSelector: StateSelector;
  lambdaCalculator: LambdaCalculator;
  polyFitter: PolynomialFitter;
}

export const DEFAULT_CAPABILITIES: AlchemyCapabilities = {
  stateSelector: energyOrderedStateSelector,
  lambdaCalculator: geometricLambdaCalculator,
  polyFitter: leastSquaresPolynomialFitter,
};

export const resolveCapabilities = (
  overrides?: Partial<AlchemyCapabilities>,
): AlchemyCapabilities => ({
  stateSelector: overrides?.stateSelector ?? DEFAULT_CAPABILITIES.stateSelector,
  lambdaCalculator: overrides?.lambdaCalculator ?? DEFAULT_CAPABILITIES.lambdaCalculator,
  polyFitter: overrides?.polyFitter ?? DEFAULT_CAPABILITIES.polyFitter,
});
