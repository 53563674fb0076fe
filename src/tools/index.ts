export { registerAnalysisTools, type AnalysisToolDeps } from "./analysis.js";
export { registerResources } from "./resources.js";
export { registerPrompts } from "./prompts.js";
