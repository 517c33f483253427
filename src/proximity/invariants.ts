import { ERROR_CODES, type ErrorCode } from "../types.js";
import type { ProximityGraph } from "./graph.js";
import type { NodeSnapshot, UserRecord } from "./types.js";

/** Violation reported when a record or chain breaks one of the invariants. */
export interface ChainInvariantViolation {
  code: ErrorCode;
  message: string;
  userId: string | null;
  details?: Record<string, unknown>;
}

/** Summary returned when auditing a record or a whole deployment. */
export type ChainInvariantReport =
  | { ok: true }
  | { ok: false; violations: ChainInvariantViolation[] };

function toReport(violations: ChainInvariantViolation[]): ChainInvariantReport {
  return violations.length === 0 ? { ok: true } : { ok: false, violations };
}

function sameNeighbors(left: readonly string[], right: readonly string[]): boolean {
  return left.length === right.length && left.every((peer, index) => peer === right[index]);
}

/**
 * Check a record against the chain reachable from its head: the cache
 * mirrors the head, every link points strictly back in time and to the same
 * owner, and the walk length matches the recorded chain length.
 */
export function auditUserRecord(record: UserRecord, history: readonly NodeSnapshot[]): ChainInvariantReport {
  const violations: ChainInvariantViolation[] = [];
  const head = history[0];
  if (!head || head.id !== record.head) {
    violations.push({
      code: ERROR_CODES.CHAIN_BROKEN_LINK,
      message: "history does not start at the record head",
      userId: record.id,
      details: { head: record.head, first: head?.id ?? null },
    });
    return toReport(violations);
  }

  if (head.timestamp !== record.current.timestamp || !sameNeighbors(head.neighbors, record.current.neighbors)) {
    violations.push({
      code: ERROR_CODES.CHAIN_STALE_CACHE,
      message: "cached contents differ from the head snapshot",
      userId: record.id,
      details: { head: head.id },
    });
  }

  history.forEach((snapshot, index) => {
    if (snapshot.owner !== record.owner) {
      violations.push({
        code: ERROR_CODES.CHAIN_OWNER_MISMATCH,
        message: `snapshot ${snapshot.id} belongs to '${snapshot.owner}'`,
        userId: record.id,
        details: { snapshot: snapshot.id },
      });
    }
    const predecessor = history[index + 1];
    if (!predecessor) {
      if (snapshot.previous !== null) {
        violations.push({
          code: ERROR_CODES.CHAIN_BROKEN_LINK,
          message: `snapshot ${snapshot.id} links to a missing predecessor`,
          userId: record.id,
          details: { snapshot: snapshot.id, previous: snapshot.previous },
        });
      }
      return;
    }
    if (snapshot.previous !== predecessor.id || predecessor.id >= snapshot.id) {
      violations.push({
        code: ERROR_CODES.CHAIN_BROKEN_LINK,
        message: `snapshot ${snapshot.id} is not linked to ${predecessor.id}`,
        userId: record.id,
        details: { snapshot: snapshot.id, previous: snapshot.previous },
      });
    }
    if (predecessor.timestamp >= snapshot.timestamp) {
      violations.push({
        code: ERROR_CODES.CHAIN_TIMESTAMP_ORDER,
        message: `snapshot ${snapshot.id} is not newer than ${predecessor.id}`,
        userId: record.id,
        details: { snapshot: snapshot.timestamp, previous: predecessor.timestamp },
      });
    }
  });

  if (history.length !== record.chainLength) {
    violations.push({
      code: ERROR_CODES.CHAIN_LENGTH_MISMATCH,
      message: `chain holds ${history.length} snapshots, record expects ${record.chainLength}`,
      userId: record.id,
    });
  }

  return toReport(violations);
}

/** Audit every record of a deployment plus registry uniqueness. */
export function auditGraph(graph: ProximityGraph): ChainInvariantReport {
  const violations: ChainInvariantViolation[] = [];

  const registered = graph.describeRegistry().registeredUsers;
  const seen = new Set<string>();
  for (const identity of registered) {
    if (seen.has(identity)) {
      violations.push({
        code: ERROR_CODES.CHAIN_DUPLICATE_IDENTITY,
        message: `identity '${identity}' registered twice`,
        userId: null,
      });
    }
    seen.add(identity);
  }

  for (const record of graph.listUsers()) {
    const report = auditUserRecord(record, graph.history(record.id));
    if (!report.ok) {
      violations.push(...report.violations);
    }
  }

  return toReport(violations);
}
