/**
 * Shared type definitions describing the in-memory representation of the
 * proximity graph. Keeping the types centralised prevents circular
 * dependencies between the registry, the chain arena and the graph facade.
 */

/** Opaque, already-authenticated account reference. Trimmed and non-empty. */
export type Identity = string;

/** Opaque reference to a peer listed as a neighbour. */
export type PeerRef = string;

/** Function returning the current epoch milliseconds, injectable for tests. */
export type Clock = () => number;

/**
 * Immutable record of a neighbour set at a point in time. Instances are frozen
 * on construction (neighbours included) and never mutated afterwards.
 */
export interface NodeSnapshot {
  readonly id: number;
  readonly owner: Identity;
  readonly neighbors: readonly PeerRef[];
  readonly timestamp: number;
  /** Identifier of the predecessor in the same chain, `null` for the root. */
  readonly previous: number | null;
}

/** Cached contents of the snapshot currently referenced by a user record. */
export interface NodeContents {
  neighbors: readonly PeerRef[];
  timestamp: number;
}

/**
 * Mutable head-of-chain pointer. `current` always mirrors the snapshot
 * referenced by `head`.
 */
export interface UserRecord {
  id: string;
  owner: Identity;
  /** True when the record was spawned through the dev capability. */
  synthetic: boolean;
  head: number;
  current: NodeContents;
  chainLength: number;
}

/** Public description of the identity registry. */
export interface RegistrySnapshot {
  id: string;
  creator: Identity;
  createdAt: number;
  registeredUsers: Identity[];
}
