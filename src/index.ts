export { bootstrapProximityGraph, ProximityGraph } from "./proximity/graph.js";
export type {
  NodeUpdateResult,
  ProximityDeployment,
  ProximityGraphOptions,
  RegisterUserInput,
  SpawnSyntheticUserInput,
  SyntheticUpdateInput,
  UpdateNodeInput,
  UserCreationResult,
} from "./proximity/graph.js";
export type { DevCapability } from "./proximity/capability.js";
export {
  AlreadyRegisteredError,
  CapabilityAlreadyMintedError,
  CapabilityMismatchError,
  ClockRegressionError,
  InvalidProximityInputError,
  NotOwnerError,
  ProximityError,
  UnknownSnapshotError,
  UnknownUserError,
  UpdateTooSoonError,
} from "./proximity/errors.js";
export {
  MIN_UPDATE_INTERVAL_MS,
  assertUpdateAllowed,
  evaluateUpdateGate,
  isUpdateAllowed,
  type UpdateGateVerdict,
} from "./proximity/updateGate.js";
export { auditGraph, auditUserRecord, type ChainInvariantReport } from "./proximity/invariants.js";
export { FileOperationJournal, type OperationJournal } from "./proximity/journal.js";
export type { Clock, Identity, NodeSnapshot, PeerRef, RegistrySnapshot, UserRecord } from "./proximity/types.js";
export { EventBus, isEventOf, type EventEnvelope, type EventFilter } from "./events/bus.js";
export type { EventMessage, ProximityEventMap } from "./events/types.js";
export { StructuredLogger, type LogEntry, type LoggerOptions } from "./logger.js";
export { loadProximityRuntimeOptions, type ProximityRuntimeOptions } from "./config/runtimeOptions.js";
export { createProximityRuntime, type ProximityRuntime } from "./runtime.js";
export { ERROR_CODES, type ErrorCode } from "./types.js";
export {
  RegisterUserInputSchema,
  SpawnSyntheticUserInputSchema,
  SyntheticUpdateInputSchema,
  UpdateNodeInputSchema,
  UserLookupInputSchema,
  handleDescribeUser,
  handleNodeHistory,
  handleRegisterUser,
  handleSpawnSyntheticUser,
  handleSyntheticUpdate,
  handleUpdateNode,
  invokeProximityTool,
  type ProximityToolContext,
} from "./tools/proximityTools.js";
