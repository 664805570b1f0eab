export * from "./types.js";
export { DecodeError, ProtocolViolation, IoError, EngineLoadError } from "./errors.js";
export { NetworkEventSchemas, MovementDataSchema, PlayerDataSchema, PartySchema } from "./network-event.schema.js";
export { SessionEventSchema } from "./session-event.schema.js";
export { CheckpointTableSchema } from "./checkpoint-table.schema.js";
export {
  validateNetworkEventData,
  isValidNetworkEvent,
  validateSessionEventData,
  validateCheckpointTableData,
  isValidCheckpointOverride,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
