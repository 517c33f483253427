import { UnknownSnapshotError } from "./errors.js";
import type { Identity, NodeSnapshot, PeerRef } from "./types.js";

/** Fields required to append a snapshot to the arena. */
export interface AppendSnapshotInput {
  owner: Identity;
  neighbors: readonly PeerRef[];
  timestamp: number;
  previous: number | null;
}

/**
 * Append-only arena of frozen snapshots keyed by a monotonic identifier.
 * Chains are linked backward only: a snapshot knows its predecessor, never its
 * successors, so history is walked from a live head towards the root.
 */
export class NodeChain {
  private readonly snapshots = new Map<number, NodeSnapshot>();
  private nextId = 1;

  /**
   * Freeze and store a new snapshot. Callers validate the link beforehand; the
   * arena only guarantees the predecessor exists.
   */
  append(input: AppendSnapshotInput): NodeSnapshot {
    if (input.previous !== null && !this.snapshots.has(input.previous)) {
      throw new UnknownSnapshotError(input.previous);
    }
    const snapshot: NodeSnapshot = Object.freeze({
      id: this.nextId,
      owner: input.owner,
      neighbors: Object.freeze([...input.neighbors]),
      timestamp: input.timestamp,
      previous: input.previous,
    });
    this.snapshots.set(snapshot.id, snapshot);
    this.nextId += 1;
    return snapshot;
  }

  get(snapshotId: number): NodeSnapshot {
    const snapshot = this.snapshots.get(snapshotId);
    if (!snapshot) {
      throw new UnknownSnapshotError(snapshotId);
    }
    return snapshot;
  }

  has(snapshotId: number): boolean {
    return this.snapshots.has(snapshotId);
  }

  /** Number of snapshots stored across every chain. */
  get size(): number {
    return this.snapshots.size;
  }

  /** Yield the snapshots from {@link headId} back to the root, newest first. */
  *walk(headId: number): Generator<NodeSnapshot, void, void> {
    let cursor: number | null = headId;
    while (cursor !== null) {
      const snapshot = this.get(cursor);
      yield snapshot;
      cursor = snapshot.previous;
    }
  }

  history(headId: number): NodeSnapshot[] {
    return [...this.walk(headId)];
  }
}
