/**
 * Payload contracts published on the event bus. Field names stay snake_case
 * so subscribers can forward them to JSON consumers unchanged.
 */

/** Emitted once per deployment when the identity registry is created. */
export interface RegistryCreatedPayload {
  registry_id: string;
  creator: string;
}

/** Emitted when a user record is created, through registration or the dev capability. */
export interface NewUserPayload {
  owner: string;
  user_id: string;
  synthetic: boolean;
}

/** Emitted every time a user record points at a new snapshot. */
export interface NodeUpdatePayload {
  user_id: string;
  current_node: number;
  timestamp: number;
}

/** Maps each message identifier to the payload it carries. */
export interface ProximityEventMap {
  registry_created: RegistryCreatedPayload;
  new_user: NewUserPayload;
  node_update: NodeUpdatePayload;
}

/** Union of the message identifiers accepted by the bus. */
export type EventMessage = keyof ProximityEventMap;

/** Union of every payload shape carried by the bus. */
export type EventPayload = ProximityEventMap[EventMessage];

const EVENT_MESSAGE_VALUES = ["registry_created", "new_user", "node_update"] as const satisfies readonly EventMessage[];

const EVENT_MESSAGE_SET: ReadonlySet<string> = new Set(EVENT_MESSAGE_VALUES);

/**
 * Returns `true` when the provided token matches a known {@link EventMessage}.
 */
export function isEventMessage(value: string): value is EventMessage {
  return EVENT_MESSAGE_SET.has(value);
}

/** Throws when the provided token does not match a known {@link EventMessage}. */
export function assertValidEventMessage(value: string): asserts value is EventMessage {
  if (!isEventMessage(value)) {
    throw new TypeError(`unknown event message: ${value}`);
  }
}

/** Expose the catalog for diagnostics and targeted assertions in tests. */
export const EVENT_MESSAGES: readonly EventMessage[] = EVENT_MESSAGE_VALUES;
