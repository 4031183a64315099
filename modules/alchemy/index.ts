export * from "./atom-predictions";
export * from "./capabilities";
export * from "./dimer-curve";
export * from "./dimer-predictions";
export * from "./lambda-value";
export * from "./poly-fit";
export * from "./prediction-types";
export * from "./qa-predictions";
export * from "./reference-resolver";
export * from "./rows";
export * from "./state-selection";
export * from "./taylor-series";
export * from "../core/alchemy-errors";
export { readAlchemyConfig, DEFAULT_ALCHEMY_CONFIG, type AlchemyConfig } from "../core/alchemy-config";
export * from "../../shared/alchemy-schema";
