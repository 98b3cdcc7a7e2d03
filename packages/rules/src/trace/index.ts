export { buildEvaluationTrace, traceToJSON, renderTraceDebug } from "./trace.js";
export type { TraceInput } from "./trace.js";
