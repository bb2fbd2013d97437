import AjvModule, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { ActionRequestSchema } from "./action-request.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import { SimulationConfigSchema, SimulationRulesSchema } from "./simulation-config.schema.js";
import type { ActionRequest, SimulationConfig } from "./types.js";

// Both packages are CommonJS; under NodeNext the default import is module.exports,
// which carries the real export on `.default`.
const ajv = new AjvModule.default({ allErrors: true, strict: false });
addFormatsModule.default(ajv);

const validateActionRequest = ajv.compile<ActionRequest>(ActionRequestSchema);
const validateJournalEvent = ajv.compile(JournalEventSchema);
const validateSimulationConfig = ajv.compile<SimulationConfig>(SimulationConfigSchema);
const validateSimulationRules = ajv.compile(SimulationRulesSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

function run(validate: ValidateFunction, data: unknown): ValidationResult {
  const valid = validate(data);
  return toResult(valid, validate.errors);
}

export function validateActionRequestData(data: unknown): ValidationResult {
  return run(validateActionRequest, data);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  return run(validateJournalEvent, data);
}

export function validateSimulationConfigData(data: unknown): ValidationResult {
  return run(validateSimulationConfig, data);
}

export function validateSimulationRulesData(data: unknown): ValidationResult {
  return run(validateSimulationRules, data);
}

export function isActionRequest(data: unknown): data is ActionRequest {
  return validateActionRequest(data);
}

export function isSimulationConfig(data: unknown): data is SimulationConfig {
  return validateSimulationConfig(data);
}
