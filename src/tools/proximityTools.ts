import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import type { DevCapability } from "../proximity/capability.js";
import { CapabilityMismatchError } from "../proximity/errors.js";
import type { NodeUpdateResult, ProximityGraph, UserCreationResult } from "../proximity/graph.js";
import type { NodeSnapshot, UserRecord } from "../proximity/types.js";
import { proximityToolError, type ToolErrorResponse } from "../server/toolErrors.js";

/** Context injected in the proximity tool handlers. */
export interface ProximityToolContext {
  graph: ProximityGraph;
  logger: StructuredLogger;
  /** Present only in sessions opened by the deployer. */
  capability?: DevCapability;
}

const IdentitySchema = z.string().trim().min(1).max(256);
const NeighborsSchema = z.array(z.string().trim().min(1).max(256)).max(4_096);
const TimestampSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/** Schema accepted by the `register_user` tool. */
export const RegisterUserInputSchema = z
  .object({
    caller: IdentitySchema,
    neighbors: NeighborsSchema.default([]),
    now: TimestampSchema.optional(),
  })
  .strict();

/** Schema accepted by the `update_node` tool. */
export const UpdateNodeInputSchema = z
  .object({
    user_id: z.string().trim().min(1),
    caller: IdentitySchema,
    neighbors: NeighborsSchema,
    now: TimestampSchema.optional(),
  })
  .strict();

/** Schema accepted by the `spawn_synthetic_user` tool. */
export const SpawnSyntheticUserInputSchema = z
  .object({
    caller: IdentitySchema,
    target: IdentitySchema,
    neighbors: NeighborsSchema.default([]),
    now: TimestampSchema.optional(),
  })
  .strict();

/** Schema accepted by the `synthetic_update` tool. */
export const SyntheticUpdateInputSchema = z
  .object({
    caller: IdentitySchema,
    user_id: z.string().trim().min(1),
    neighbors: NeighborsSchema,
    now: TimestampSchema.optional(),
  })
  .strict();

/** Schema shared by the read-only `describe_user` and `node_history` tools. */
export const UserLookupInputSchema = z
  .object({
    user_id: z.string().trim().min(1),
    limit: z.number().int().min(1).max(10_000).optional(),
  })
  .strict();

export type RegisterUserInput = z.infer<typeof RegisterUserInputSchema>;
export type UpdateNodeInput = z.infer<typeof UpdateNodeInputSchema>;
export type SpawnSyntheticUserInput = z.infer<typeof SpawnSyntheticUserInputSchema>;
export type SyntheticUpdateInput = z.infer<typeof SyntheticUpdateInputSchema>;
export type UserLookupInput = z.infer<typeof UserLookupInputSchema>;

/** Wire representation of a snapshot. */
export interface SnapshotPayload {
  id: number;
  owner: string;
  neighbors: string[];
  timestamp: number;
  previous: number | null;
}

/** Wire representation of a user record. */
export interface UserPayload {
  user_id: string;
  owner: string;
  synthetic: boolean;
  head: number;
  current: { neighbors: string[]; timestamp: number };
  chain_length: number;
}

export interface UserCreationResponse {
  user: UserPayload;
  snapshot: SnapshotPayload;
}

export interface NodeUpdateResponse {
  user: UserPayload;
  snapshot: SnapshotPayload;
  previous_id: number;
}

export interface NodeHistoryResponse {
  user_id: string;
  chain_length: number;
  snapshots: SnapshotPayload[];
}

export function serialiseSnapshot(snapshot: NodeSnapshot): SnapshotPayload {
  return {
    id: snapshot.id,
    owner: snapshot.owner,
    neighbors: [...snapshot.neighbors],
    timestamp: snapshot.timestamp,
    previous: snapshot.previous,
  };
}

export function serialiseUser(record: UserRecord): UserPayload {
  return {
    user_id: record.id,
    owner: record.owner,
    synthetic: record.synthetic,
    head: record.head,
    current: { neighbors: [...record.current.neighbors], timestamp: record.current.timestamp },
    chain_length: record.chainLength,
  };
}

function serialiseCreation(result: UserCreationResult): UserCreationResponse {
  return { user: serialiseUser(result.user), snapshot: serialiseSnapshot(result.snapshot) };
}

function serialiseUpdate(result: NodeUpdateResult): NodeUpdateResponse {
  return {
    user: serialiseUser(result.user),
    snapshot: serialiseSnapshot(result.snapshot),
    previous_id: result.previous.id,
  };
}

export async function handleRegisterUser(
  context: ProximityToolContext,
  input: RegisterUserInput,
): Promise<UserCreationResponse> {
  const result = await context.graph.registerUser({
    caller: input.caller,
    neighbors: input.neighbors,
    now: input.now,
  });
  return serialiseCreation(result);
}

export async function handleUpdateNode(context: ProximityToolContext, input: UpdateNodeInput): Promise<NodeUpdateResponse> {
  const result = await context.graph.updateNode({
    userId: input.user_id,
    caller: input.caller,
    neighbors: input.neighbors,
    now: input.now,
  });
  return serialiseUpdate(result);
}

function requireCapability(context: ProximityToolContext, caller: string): DevCapability {
  if (!context.capability) {
    throw new CapabilityMismatchError(null, caller);
  }
  return context.capability;
}

export async function handleSpawnSyntheticUser(
  context: ProximityToolContext,
  input: SpawnSyntheticUserInput,
): Promise<UserCreationResponse> {
  const result = await context.graph.spawnSyntheticUser({
    capability: requireCapability(context, input.caller),
    caller: input.caller,
    target: input.target,
    neighbors: input.neighbors,
    now: input.now,
  });
  return serialiseCreation(result);
}

export async function handleSyntheticUpdate(
  context: ProximityToolContext,
  input: SyntheticUpdateInput,
): Promise<NodeUpdateResponse> {
  const result = await context.graph.syntheticUpdate({
    capability: requireCapability(context, input.caller),
    caller: input.caller,
    userId: input.user_id,
    neighbors: input.neighbors,
    now: input.now,
  });
  return serialiseUpdate(result);
}

export function handleDescribeUser(context: ProximityToolContext, input: UserLookupInput): UserPayload {
  return serialiseUser(context.graph.getUser(input.user_id));
}

/** Walks the chain from the head; `limit` keeps only the newest entries. */
export function handleNodeHistory(context: ProximityToolContext, input: UserLookupInput): NodeHistoryResponse {
  const record = context.graph.getUser(input.user_id);
  const history = context.graph.history(input.user_id);
  const snapshots = input.limit !== undefined ? history.slice(0, input.limit) : history;
  return {
    user_id: record.id,
    chain_length: record.chainLength,
    snapshots: snapshots.map(serialiseSnapshot),
  };
}

const LOGGED_IDENTIFIERS = ["caller", "user_id", "target"] as const;

/** Identifiers copied from the raw payload into failure logs, even when parsing failed. */
function identifiersOf(raw: unknown): Record<string, string> {
  const context: Record<string, string> = {};
  if (typeof raw !== "object" || raw === null) {
    return context;
  }
  for (const key of LOGGED_IDENTIFIERS) {
    const value: unknown = Reflect.get(raw, key);
    if (typeof value === "string") {
      context[key] = value;
    }
  }
  return context;
}

/** Either the handler result or the structured error payload. */
export type ToolResponse<T> = { ok: true; result: T } | ToolErrorResponse;

/**
 * Parse the raw payload with {@link schema}, run the handler and turn every
 * failure (validation included) into a logged {@link ToolErrorResponse}.
 */
export async function invokeProximityTool<S extends z.ZodTypeAny, T>(
  context: ProximityToolContext,
  toolName: string,
  schema: S,
  raw: unknown,
  handler: (context: ProximityToolContext, input: z.infer<S>) => Promise<T> | T,
): Promise<ToolResponse<T>> {
  try {
    const input: z.infer<S> = schema.parse(raw);
    const result = await handler(context, input);
    return { ok: true, result };
  } catch (error) {
    return proximityToolError(context.logger, toolName, error, identifiersOf(raw));
  }
}
