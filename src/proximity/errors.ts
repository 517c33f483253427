import { ERROR_CODES, type ErrorCode } from "../types.js";
import type { Identity } from "./types.js";

/**
 * Base error thrown by the proximity graph whenever an operation is rejected.
 * Every subclass carries a stable code so callers can assert on the exact
 * cause without parsing messages.
 */
export class ProximityError extends Error {
  /** Stable error code surfaced to clients. */
  public readonly code: ErrorCode;

  /** Optional operator hint describing how to recover from the error. */
  public readonly hint?: string;

  constructor(code: ErrorCode, message: string, hint?: string) {
    super(message);
    this.name = "ProximityError";
    this.code = code;
    this.hint = hint;
  }
}

/** Error thrown when an identity attempts to register a second time. */
export class AlreadyRegisteredError extends ProximityError {
  public readonly details: { registryId: string; identity: Identity };

  constructor(registryId: string, identity: Identity) {
    super(ERROR_CODES.REG_ALREADY_REGISTERED, `identity '${identity}' is already registered`, "reuse the existing user record");
    this.name = "AlreadyRegisteredError";
    this.details = { registryId, identity };
  }
}

/** Error thrown when a caller tries to advance a record it does not own. */
export class NotOwnerError extends ProximityError {
  public readonly details: { userId: string; owner: Identity; caller: Identity };

  constructor(userId: string, owner: Identity, caller: Identity) {
    super(ERROR_CODES.NODE_NOT_OWNER, `user '${userId}' is not owned by '${caller}'`, "only the record owner may update it");
    this.name = "NotOwnerError";
    this.details = { userId, owner, caller };
  }
}

/** Error thrown when an update arrives before the minimum interval elapsed. */
export class UpdateTooSoonError extends ProximityError {
  public readonly details: { lastTimestamp: number; now: number; minIntervalMs: number; retryAt: number };

  constructor(lastTimestamp: number, now: number, minIntervalMs: number) {
    super(ERROR_CODES.NODE_TOO_SOON, "node update rate limited", "retry once the minimum interval has elapsed");
    this.name = "UpdateTooSoonError";
    this.details = { lastTimestamp, now, minIntervalMs, retryAt: lastTimestamp + minIntervalMs };
  }
}

/** Error thrown when the supplied clock reading does not follow the last update. */
export class ClockRegressionError extends ProximityError {
  public readonly details: { lastTimestamp: number; now: number };

  constructor(lastTimestamp: number, now: number) {
    super(
      ERROR_CODES.NODE_CLOCK_REGRESSION,
      now === lastTimestamp ? "clock did not advance" : "clock moved backward",
      "supply a timestamp later than the last update",
    );
    this.name = "ClockRegressionError";
    this.details = { lastTimestamp, now };
  }
}

/** Error thrown when a capability is presented by someone other than its holder. */
export class CapabilityMismatchError extends ProximityError {
  public readonly details: { capabilityId: string | null; caller: Identity };

  /** {@link capabilityId} is `null` when the caller presented no token at all. */
  constructor(capabilityId: string | null, caller: Identity) {
    super(ERROR_CODES.CAP_MISMATCH, "capability not held by caller", "present the capability minted for this deployment");
    this.name = "CapabilityMismatchError";
    this.details = { capabilityId, caller };
  }
}

/** Error thrown when a deployment is asked for a second dev capability. */
export class CapabilityAlreadyMintedError extends ProximityError {
  public readonly details: { capabilityId: string; deployer: Identity };

  constructor(capabilityId: string, deployer: Identity) {
    super(ERROR_CODES.CAP_ALREADY_MINTED, "dev capability already minted for this deployment");
    this.name = "CapabilityAlreadyMintedError";
    this.details = { capabilityId, deployer };
  }
}

/** Error thrown when an operation references an unknown user record. */
export class UnknownUserError extends ProximityError {
  public readonly details: { userId: string };

  constructor(userId: string) {
    super(ERROR_CODES.NODE_NOT_FOUND, `user '${userId}' not found`, "register the identity before updating it");
    this.name = "UnknownUserError";
    this.details = { userId };
  }
}

/** Error thrown when a snapshot identifier does not exist in the arena. */
export class UnknownSnapshotError extends ProximityError {
  public readonly details: { snapshotId: number };

  constructor(snapshotId: number) {
    super(ERROR_CODES.NODE_SNAPSHOT_NOT_FOUND, `snapshot '${snapshotId}' not found`);
    this.name = "UnknownSnapshotError";
    this.details = { snapshotId };
  }
}

/** Error thrown when caller-supplied values cannot be normalised. */
export class InvalidProximityInputError extends ProximityError {
  public readonly details: { field: string };

  constructor(field: string, message: string) {
    super(ERROR_CODES.PROX_INVALID_INPUT, message);
    this.name = "InvalidProximityInputError";
    this.details = { field };
  }
}
