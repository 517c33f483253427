import { ClockRegressionError, UpdateTooSoonError } from "./errors.js";

/** Minimum delay (milliseconds) between two snapshots of the same record. */
export const MIN_UPDATE_INTERVAL_MS = 10_000;

/** Outcome of {@link evaluateUpdateGate}. */
export type UpdateGateVerdict =
  | { allowed: true; elapsedMs: number }
  | { allowed: false; reason: "too_soon"; elapsedMs: number; retryAt: number }
  | { allowed: false; reason: "clock_regression"; elapsedMs: number };

/**
 * Pure predicate deciding whether a new snapshot may follow the one stamped
 * {@link lastTimestamp}. The boundary is inclusive. A reading earlier than the
 * last timestamp is reported as a regression rather than treated as elapsed.
 */
export function evaluateUpdateGate(
  now: number,
  lastTimestamp: number,
  minIntervalMs = MIN_UPDATE_INTERVAL_MS,
): UpdateGateVerdict {
  const elapsedMs = now - lastTimestamp;
  if (elapsedMs < 0) {
    return { allowed: false, reason: "clock_regression", elapsedMs };
  }
  if (elapsedMs < minIntervalMs) {
    return { allowed: false, reason: "too_soon", elapsedMs, retryAt: lastTimestamp + minIntervalMs };
  }
  return { allowed: true, elapsedMs };
}

export function isUpdateAllowed(now: number, lastTimestamp: number, minIntervalMs = MIN_UPDATE_INTERVAL_MS): boolean {
  return evaluateUpdateGate(now, lastTimestamp, minIntervalMs).allowed;
}

/** Throws the error matching the gate verdict. */
export function assertUpdateAllowed(now: number, lastTimestamp: number, minIntervalMs = MIN_UPDATE_INTERVAL_MS): void {
  const verdict = evaluateUpdateGate(now, lastTimestamp, minIntervalMs);
  if (verdict.allowed) {
    return;
  }
  if (verdict.reason === "clock_regression") {
    throw new ClockRegressionError(lastTimestamp, now);
  }
  throw new UpdateTooSoonError(lastTimestamp, now, minIntervalMs);
}

/**
 * Used by exempt synthetic updates: skips the interval but still requires the
 * reading to move strictly past the last snapshot.
 */
export function assertClockMonotonic(now: number, lastTimestamp: number): void {
  if (now <= lastTimestamp) {
    throw new ClockRegressionError(lastTimestamp, now);
  }
}
