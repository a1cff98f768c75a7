export * from "./types";
export { applyIndicators } from "./pipeline";
export { classifyMomentum, summarizeSeries } from "./summary";
export { analyzeSymbol } from "./analyzeSymbol";
