import { z } from "zod";

import { readBool, readInt, readOptionalString, type EnvRecord } from "./env.js";

/** Default number of events retained by the in-memory bus. */
export const DEFAULT_EVENT_HISTORY_LIMIT = 1_000;

/**
 * Schema guarding the resolved runtime configuration. Environment readers
 * already coerce types; the schema enforces the cross-field constraints.
 */
export const ProximityRuntimeOptionsSchema = z
  .object({
    deployer: z.string().trim().min(1, "PROXIMITY_DEPLOYER must name the deploying identity"),
    logFile: z.string().trim().min(1).nullable(),
    logRedact: z.string().nullable(),
    eventHistoryLimit: z.number().int().min(1).max(1_000_000),
    journalDir: z.string().trim().min(1).nullable(),
    syntheticBypassesGate: z.boolean(),
  })
  .strict();

export type ProximityRuntimeOptions = z.infer<typeof ProximityRuntimeOptionsSchema>;

/**
 * Resolve runtime options from environment variables:
 *
 * - `PROXIMITY_DEPLOYER` (required)
 * - `PROXIMITY_LOG_FILE`
 * - `PROXIMITY_LOG_REDACT`
 * - `PROXIMITY_EVENT_HISTORY_LIMIT`
 * - `PROXIMITY_JOURNAL_DIR`
 * - `PROXIMITY_SYNTHETIC_BYPASS_GATE`
 *
 * Throws a `ZodError` when the deployer is missing.
 */
export function loadProximityRuntimeOptions(env: EnvRecord = process.env): ProximityRuntimeOptions {
  return ProximityRuntimeOptionsSchema.parse({
    deployer: readOptionalString("PROXIMITY_DEPLOYER", env) ?? "",
    logFile: readOptionalString("PROXIMITY_LOG_FILE", env) ?? null,
    logRedact: readOptionalString("PROXIMITY_LOG_REDACT", env) ?? null,
    eventHistoryLimit: readInt("PROXIMITY_EVENT_HISTORY_LIMIT", DEFAULT_EVENT_HISTORY_LIMIT, { min: 1 }, env),
    journalDir: readOptionalString("PROXIMITY_JOURNAL_DIR", env) ?? null,
    syntheticBypassesGate: readBool("PROXIMITY_SYNTHETIC_BYPASS_GATE", false, env),
  });
}
