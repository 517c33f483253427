import { mkdir, appendFile } from "node:fs/promises";
import { resolve, join } from "node:path";

import type { StructuredLogger } from "../logger.js";

/**
 * Minimal payload captured for every committed state transition. The `kind`
 * field names the operation while the remaining keys carry identifiers.
 */
export interface JournalOperation {
  kind:
    | "registry_created"
    | "user_registered"
    | "node_updated"
    | "synthetic_user_spawned"
    | "synthetic_node_updated";
  registry_id: string;
  [key: string]: unknown;
}

/**
 * Resolve the JSONL file receiving entries for the provided timestamp. Entries
 * are grouped by day (UTC) to keep files human navigable.
 */
export function resolveJournalPath(timestamp: number, rootDir: string): string {
  const date = new Date(timestamp);
  const stamp = `${date.getUTCFullYear()}${String(date.getUTCMonth() + 1).padStart(2, "0")}${String(
    date.getUTCDate(),
  ).padStart(2, "0")}`;
  return join(rootDir, `${stamp}.log`);
}

/** Append one operation to the JSONL journal under {@link rootDir}. */
export async function appendJournalEntry(operation: JournalOperation, timestamp: number, rootDir: string): Promise<string> {
  const root = resolve(rootDir);
  await mkdir(root, { recursive: true });
  const file = resolveJournalPath(timestamp, root);
  await appendFile(file, `${JSON.stringify({ ts: timestamp, op: operation })}\n`, { encoding: "utf8" });
  return file;
}

/** Sink receiving committed operations. */
export interface OperationJournal {
  record(operation: JournalOperation, timestamp: number): Promise<void>;
}

/**
 * File-backed journal. A failed write never rolls back the committed
 * operation; it is reported through the logger instead.
 */
export class FileOperationJournal implements OperationJournal {
  constructor(
    private readonly rootDir: string,
    private readonly logger: StructuredLogger,
  ) {}

  async record(operation: JournalOperation, timestamp: number): Promise<void> {
    try {
      await appendJournalEntry(operation, timestamp, this.rootDir);
    } catch (error) {
      this.logger.error("journal_append_failed", {
        kind: operation.kind,
        root_dir: this.rootDir,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/** Journal used when no directory is configured. */
export const NOOP_JOURNAL: OperationJournal = {
  async record(): Promise<void> {},
};
