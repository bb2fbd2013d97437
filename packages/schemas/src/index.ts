export * from "./types.js";
export { ActionRequestSchema } from "./action-request.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
export { SimulationConfigSchema, SimulationRulesSchema, ResourceLevelsSchema } from "./simulation-config.schema.js";
export {
  validateActionRequestData,
  validateJournalEventData,
  validateSimulationConfigData,
  validateSimulationRulesData,
  isActionRequest,
  isSimulationConfig,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { ConfigurationError, TimeoutError, withTimeout, errorMessage } from "./errors.js";
