import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES, normaliseErrorHint, normaliseErrorMessage } from "../types.js";
import { omitUndefinedEntries } from "../utils/object.js";

/**
 * Structured payload returned by tool handlers when an error occurs. Clients
 * branch on `ok` and then on the stable `error` code.
 */
export interface ToolErrorResponse {
  ok: false;
  error: string;
  tool: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/**
 * Normalised representation of a thrown error used to enrich tool responses and
 * log entries with machine readable metadata.
 */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/** Configuration describing the codes associated with an error category. */
export interface ToolErrorCodes {
  /** Default error code applied when no specific mapping is provided. */
  defaultCode: string;
  /** Optional error code used when the failure originates from input parsing. */
  invalidInputCode?: string;
}

function readStringField(error: unknown, field: "code" | "hint"): string | undefined {
  if (typeof error !== "object" || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Normalises an arbitrary error into a structured representation that captures
 * the code, message, optional hint and any provided details. Zod validation
 * errors are mapped to the invalid-input code.
 */
export function normaliseToolError(error: unknown, codes: ToolErrorCodes): NormalisedToolError {
  const message = error instanceof Error ? error.message : String(error);
  let code = codes.defaultCode;
  let hint: string | undefined;
  let details: unknown;

  if (error instanceof z.ZodError) {
    code = codes.invalidInputCode ?? codes.defaultCode;
    hint = "invalid_input";
    details = { issues: error.issues };
  } else {
    code = readStringField(error, "code") ?? codes.defaultCode;
    hint = readStringField(error, "hint");
    if (typeof error === "object" && error !== null && "details" in error) {
      details = Reflect.get(error, "details");
    }
  }

  return {
    code,
    message: normaliseErrorMessage(message),
    ...omitUndefinedEntries({
      hint: normaliseErrorHint(hint),
      details,
    }),
  };
}

const PROXIMITY_ERROR_CODES: ToolErrorCodes = {
  defaultCode: ERROR_CODES.PROX_UNEXPECTED,
  invalidInputCode: ERROR_CODES.PROX_INVALID_INPUT,
};

/** Writes the structured error into the shared logger and returns the response. */
export function proximityToolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  const normalised = normaliseToolError(error, PROXIMITY_ERROR_CODES);
  logger.error(`${toolName}_failed`, {
    ...context,
    message: normalised.message,
    code: normalised.code,
    details: normalised.details,
  });

  return {
    ok: false,
    error: normalised.code,
    tool: toolName,
    message: normalised.message,
    ...omitUndefinedEntries({ hint: normalised.hint, details: normalised.details }),
  };
}
