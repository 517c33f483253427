import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default placeholder inserted when a secret token is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling custom secret redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling secret redaction despite configured tokens. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "secret",
  "password",
]);

/**
 * Parses the `PROXIMITY_LOG_REDACT` directive so operators can both toggle
 * redaction and provide a list of sensitive substrings that must be scrubbed
 * from persisted artefacts. The helper accepts comma-separated directives such
 * as `"on,sk-"` or `"off"` and defaults to enabling redaction when custom
 * patterns are provided without an explicit toggle.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  if (directives.length === 0) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  if (enabled === undefined) {
    enabled = tokens.length > 0;
  }

  return { enabled, tokens: Array.from(new Set(tokens)) };
}

/** Default maximum size (in bytes) of the primary log file before a rotation is triggered. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Tokens or patterns scrubbed from string values when redaction is enabled. */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Raw redaction directive (same grammar as `PROXIMITY_LOG_REDACT`). Callers
   * usually pass the value resolved by the runtime options.
   */
  readonly redactDirective?: string;
  /** Explicit toggle overriding the directive. */
  readonly redactionEnabled?: boolean;
  /** Suppress the stdout mirror; entries still reach the file and the listener. */
  readonly silent?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly silent: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Tracks whether the directory containing {@link logFile} has already been created. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(options.redactDirective);
    const combined = new Set<string | RegExp>(directives.tokens);
    for (const entry of options.redactSecrets ?? []) {
      combined.add(entry);
    }
    this.redactSecrets = [...combined];
    this.redactionEnabled = options.redactionEnabled ?? (directives.enabled || (options.redactSecrets?.length ?? 0) > 0);
    this.silent = options.silent ?? false;
    this.entryListener = options.onEntry;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const safePayload = payload !== undefined ? this.redactStructuredValue(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (!this.silent) {
      process.stdout.write(line);
    }
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          this.reportInternalFailure("log_file_write_failed", err);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active log file when appending the provided payload would
   * exceed the configured size limit. Rotation keeps at most
   * {@link maxFileCount} historical files alongside the active one.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      const stats = await stat(logFile);
      currentSize = stats.size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      this.reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  /** Executes the rotation sequence while honouring {@link maxFileCount}. */
  private async performRotation(logFile: string): Promise<void> {
    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${keep - 1}`, { force: true });

    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: error instanceof Error ? { message: error.message } : { error: String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private redactStructuredValue(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.redactString(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private redactString(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!(isErrnoException(error) && error.code === "ENOENT")) {
      throw error;
    }
  }
}
