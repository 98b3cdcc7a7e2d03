export { RulesEngine, createRulesEngine } from "./engine.js";
export type { RulesEngineOptions, EvaluateOptions, Evaluation } from "./engine.js";
