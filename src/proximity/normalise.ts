import { InvalidProximityInputError } from "./errors.js";
import type { Identity, PeerRef } from "./types.js";

export function normaliseIdentity(identity: string, field = "identity"): Identity {
  if (typeof identity !== "string") {
    throw new InvalidProximityInputError(field, `${field} must be a string`);
  }
  const trimmed = identity.trim();
  if (trimmed.length === 0) {
    throw new InvalidProximityInputError(field, `${field} must not be empty`);
  }
  return trimmed;
}

/**
 * Trims every neighbour reference while preserving the caller's ordering.
 * Empty lists are valid; empty references are not.
 */
export function normaliseNeighbors(neighbors: readonly string[]): PeerRef[] {
  if (!Array.isArray(neighbors)) {
    throw new InvalidProximityInputError("neighbors", "neighbors must be an array");
  }
  return neighbors.map((peer, index) => {
    if (typeof peer !== "string" || peer.trim().length === 0) {
      throw new InvalidProximityInputError("neighbors", `neighbor at index ${index} must be a non-empty string`);
    }
    return peer.trim();
  });
}

export function normaliseTimestamp(now: number): number {
  if (!Number.isSafeInteger(now) || now < 0) {
    throw new InvalidProximityInputError("now", "timestamp must be a non-negative integer");
  }
  return now;
}
