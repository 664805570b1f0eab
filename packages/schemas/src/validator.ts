import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { NetworkEventSchemas } from "./network-event.schema.js";
import { SessionEventSchema } from "./session-event.schema.js";
import { CheckpointTableSchema } from "./checkpoint-table.schema.js";
import type { CheckpointOverride, NetworkEvent, NetworkEventType, SessionEvent } from "./types.js";
import { NETWORK_EVENT_TYPES } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop; resolve it here.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const eventValidators = new Map<NetworkEventType, ValidateFunction<NetworkEvent>>();
for (const type of NETWORK_EVENT_TYPES) {
  eventValidators.set(type, ajv.compile<NetworkEvent>(NetworkEventSchemas[type]));
}

const validateSessionEvent = ajv.compile<SessionEvent>(SessionEventSchema);
const validateCheckpointTable = ajv.compile<CheckpointOverride>(CheckpointTableSchema);

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

/** Validates `data` against the schema of the given event tag. */
export function validateNetworkEventData(type: NetworkEventType, data: unknown): ValidationResult {
  const validate = eventValidators.get(type);
  if (!validate) return { valid: false, errors: [`/type: no schema for "${type}"`] };
  const valid = validate(data);
  return toResult(valid, validate.errors);
}

/** Type guard form of {@link validateNetworkEventData}. */
export function isValidNetworkEvent(type: NetworkEventType, data: unknown): data is NetworkEvent {
  const validate = eventValidators.get(type);
  return validate !== undefined && validate(data);
}

export function validateSessionEventData(data: unknown): ValidationResult {
  const valid = validateSessionEvent(data);
  return toResult(valid, validateSessionEvent.errors);
}

export function validateCheckpointTableData(data: unknown): ValidationResult {
  const valid = validateCheckpointTable(data);
  return toResult(valid, validateCheckpointTable.errors);
}

export function isValidCheckpointOverride(data: unknown): data is CheckpointOverride {
  return validateCheckpointTable(data);
}
