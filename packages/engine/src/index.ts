export { TurnController } from "./turn-controller.js";
export type { TurnControllerOptions } from "./turn-controller.js";
export { WorldState } from "./world-state.js";
export { RelationshipLedger, RelationshipEngine } from "./relationships.js";
export { analyzeTone, classifyTone } from "./message-tone.js";
export type { ToneAnalysis } from "./message-tone.js";
export { ActionResolver, sanitizeTarget, matchTarget } from "./action-resolver.js";
export type { Resolution, StepContext } from "./action-resolver.js";
export { RepetitionGuard } from "./repetition-guard.js";
export type { RepetitionGuardConfig } from "./repetition-guard.js";
export { scoreActions, rankActions, pickTarget } from "./action-bias.js";
export type { ActionScores, RankedAction } from "./action-bias.js";
export { buildObservation, recentInteractions } from "./observation.js";
export type { ObservationSources } from "./observation.js";
export { DEFAULT_RULES, DEFAULT_SETTINGS, resolveRules, mapActionKinds, mapResourceActionKinds } from "./rules.js";
export { validateConfig, withDefaultSettings } from "./config.js";
export { ConsoleLogger, silentLogger } from "./logger.js";
