// Types
export type { GlobalParameters, MarketParameters } from "./types";
export type { MarketDefinition, MarketsConfig } from "./config";
export type { ParameterStore } from "./store";

// Defaults and parsing
export { DEFAULT_GLOBAL_PARAMETERS, parseMarketsConfig } from "./config";

// Store
export { createParameterStore } from "./store";
