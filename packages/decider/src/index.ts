export { LLMDecider, parseActionResponse } from "./llm-decider.js";
export type { ModelCallFn, ModelCallResult } from "./llm-decider.js";
export { ScriptedDecider } from "./scripted-decider.js";
export type { ScriptFn } from "./scripted-decider.js";
export { BiasDecider } from "./bias-decider.js";
export { buildSystemPrompt, buildUserPrompt, buildTrendDisplay, describeRelationship, repetitionWarning } from "./prompt.js";
