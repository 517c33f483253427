/**
 * Shared types used across the proximity graph. Grouping these definitions
 * keeps the error catalogue and its helpers consistent between modules.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth ensures every operation emits consistent
 * codes which simplifies documentation and client handling.
 */
export const ERROR_CATALOG = {
  REG: {
    ALREADY_REGISTERED: "E-REG-ALREADY-REGISTERED",
  },
  NODE: {
    NOT_OWNER: "E-NODE-NOT-OWNER",
    TOO_SOON: "E-NODE-TOO-SOON",
    CLOCK_REGRESSION: "E-NODE-CLOCK-REGRESSION",
    NOT_FOUND: "E-NODE-NOT-FOUND",
    SNAPSHOT_NOT_FOUND: "E-NODE-SNAPSHOT-NOT-FOUND",
  },
  CAP: {
    MISMATCH: "E-CAP-MISMATCH",
    ALREADY_MINTED: "E-CAP-ALREADY-MINTED",
  },
  CHAIN: {
    BROKEN_LINK: "E-CHAIN-BROKEN-LINK",
    TIMESTAMP_ORDER: "E-CHAIN-TIMESTAMP-ORDER",
    OWNER_MISMATCH: "E-CHAIN-OWNER-MISMATCH",
    STALE_CACHE: "E-CHAIN-STALE-CACHE",
    LENGTH_MISMATCH: "E-CHAIN-LENGTH-MISMATCH",
    DUPLICATE_IDENTITY: "E-CHAIN-DUPLICATE-IDENTITY",
  },
  PROX: {
    INVALID_INPUT: "E-PROX-INVALID-INPUT",
    UNEXPECTED: "E-PROX-UNEXPECTED",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `NODE_TOO_SOON`). The helper keeps runtime data immutable while
 * preserving the strongly typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.NODE_NOT_OWNER`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the graph. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. If the provided text is empty once trimmed a generic
 * fallback is returned so clients never receive an empty string.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Normalises the optional hint attached to an error. Empty strings collapse to
 * `undefined` while overly long hints are truncated to keep payloads concise.
 */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}
