import { EventEmitter } from "node:events";
import { assertValidEventMessage, type EventMessage, type ProximityEventMap } from "./types.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * High-level category describing the resource that produced the event.
 */
export type EventCategory = "registry" | "user" | "node";

/**
 * Severity levels supported by the event bus. The values mirror the
 * structured logger which keeps cross-sink correlation trivial.
 */
export type EventLevel = "info" | "warn" | "error";

/** Fields shared by every envelope regardless of the message it carries. */
export interface EventEnvelopeBase {
  seq: number;
  ts: number;
  cat: EventCategory;
  level: EventLevel;
  registryId: string | null;
  userId: string | null;
  owner: string | null;
  /** Identifier describing the component that emitted the event. */
  component: string | null;
  /** Lifecycle stage or semantic step associated with the event. */
  stage: string | null;
  /** Upper-cased semantic kind (`NODE_UPDATE`, ...). */
  kind: string;
}

/**
 * Event envelope persisted by the bus. Optional identifiers default to `null`
 * instead of `undefined` so JSON serialisation stays deterministic in tests.
 */
export type EventEnvelope<M extends EventMessage = EventMessage> = EventEnvelopeBase & {
  msg: M;
  data: ProximityEventMap[M];
};

/**
 * Input accepted by {@link EventBus.publish}. The helper fills the timestamp
 * and sequence number when not explicitly provided.
 */
export interface EventInput<M extends EventMessage> {
  cat: EventCategory;
  level?: EventLevel;
  registryId?: string | null;
  userId?: string | null;
  owner?: string | null;
  component?: string | null;
  stage?: string | null;
  kind?: string | null;
  msg: M;
  data: ProximityEventMap[M];
  ts?: number;
}

/** Filters supported when listing or subscribing to events. */
export interface EventFilter {
  cats?: EventCategory[];
  levels?: EventLevel[];
  msgs?: EventMessage[];
  registryId?: string;
  userId?: string;
  owner?: string;
  afterSeq?: number;
  limit?: number;
}

/** Options accepted when instantiating the event bus. */
export interface EventBusOptions {
  historyLimit?: number;
  now?: () => number;
  streamBufferSize?: number;
}

const BUS_EVENT = "event";
const DEFAULT_HISTORY_LIMIT = 1_000;
const DEFAULT_STREAM_BUFFER = 256;

export const EVENT_CATEGORIES: readonly EventCategory[] = ["registry", "user", "node"] as const;

const ALLOWED_CATEGORIES = new Set<EventCategory>(EVENT_CATEGORIES);

function normaliseCategory(cat: EventCategory): EventCategory {
  if (!ALLOWED_CATEGORIES.has(cat)) {
    throw new TypeError(`unknown event category: ${cat}`);
  }
  return cat;
}

/**
 * Subscribers observe upper-cased identifiers so dashboards can compare
 * against stable NEW_USER/NODE_UPDATE tokens regardless of the casing
 * provided by publishers.
 */
function normaliseKind(kind: string | null | undefined, fallback: EventMessage): string {
  if (typeof kind !== "string" || kind.trim().length === 0) {
    return fallback.toUpperCase();
  }
  return kind.trim().toUpperCase();
}

/**
 * Normalise optional textual tags (component/stage) by trimming whitespace and
 * rejecting empty strings.
 */
function normaliseTag(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Narrows an envelope to the payload carried by {@link msg}. */
export function isEventOf<M extends EventMessage>(event: EventEnvelope, msg: M): event is EventEnvelope<M> {
  return event.msg === msg;
}

export class EventStream
  implements AsyncIterable<EventEnvelope>, AsyncIterator<EventEnvelope, void, void>
{
  private readonly buffer: EventEnvelope[] = [];
  private resolve?: (result: IteratorResult<EventEnvelope, void>) => void;
  private closed = false;

  private static readonly DONE: IteratorReturnResult<void> = Object.freeze({
    value: undefined,
    done: true as const,
  });

  constructor(
    private readonly emitter: EventEmitter,
    private readonly matcher: (event: EventEnvelope) => boolean,
    seed: Iterable<EventEnvelope>,
    private readonly maxBuffer: number,
  ) {
    for (const event of seed) {
      this.enqueue(event);
    }
    this.emitter.on(BUS_EVENT, this.handleEvent);
  }

  [Symbol.asyncIterator](): AsyncIterator<EventEnvelope, void> {
    return this;
  }

  async next(): Promise<IteratorResult<EventEnvelope, void>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return { value: buffered, done: false };
    }
    if (this.closed) {
      return EventStream.DONE;
    }
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  async return(): Promise<IteratorResult<EventEnvelope, void>> {
    this.close();
    return EventStream.DONE;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.emitter.removeListener(BUS_EVENT, this.handleEvent);
    if (this.resolve) {
      this.resolve(EventStream.DONE);
      this.resolve = undefined;
    }
    this.buffer.length = 0;
  }

  private handleEvent = (event: EventEnvelope) => {
    if (this.closed || !this.matcher(event)) {
      return;
    }
    if (this.resolve) {
      this.resolve({ value: event, done: false });
      this.resolve = undefined;
      return;
    }
    this.enqueue(event);
  };

  private enqueue(event: EventEnvelope): void {
    this.buffer.push(event);
    if (this.buffer.length > this.maxBuffer) {
      const idx = this.buffer.findIndex((candidate) => candidate.level === "info");
      if (idx >= 0) {
        this.buffer.splice(idx, 1);
      } else {
        this.buffer.shift();
      }
    }
  }
}

/**
 * Event bus buffering graph events in memory. The bus offers both random
 * access (via {@link list}) and streaming (via {@link subscribe}).
 */
export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly history: EventEnvelope[] = [];
  private historyLimit: number;
  private readonly now: () => number;
  private readonly streamBufferSize: number;
  private seq = 0;

  constructor(options: EventBusOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.now = options.now ?? (() => Date.now());
    this.streamBufferSize = Math.max(1, options.streamBufferSize ?? DEFAULT_STREAM_BUFFER);
  }

  setHistoryLimit(limit: number): void {
    this.historyLimit = Math.max(1, limit);
    this.trimHistory();
  }

  publish<M extends EventMessage>(input: EventInput<M>): EventEnvelope<M> {
    assertValidEventMessage(input.msg);
    const envelope: EventEnvelope<M> = {
      seq: ++this.seq,
      ts: input.ts ?? this.now(),
      cat: normaliseCategory(input.cat),
      level: input.level ?? "info",
      registryId: input.registryId ?? null,
      userId: input.userId ?? null,
      owner: input.owner ?? null,
      component: normaliseTag(input.component ?? input.cat),
      stage: normaliseTag(input.stage ?? input.msg),
      kind: normaliseKind(input.kind, input.msg),
      msg: input.msg,
      data: input.data,
    };

    this.history.push(envelope);
    if (this.history.length > this.historyLimit) {
      this.dropFromHistory();
    }

    this.emitter.emit(BUS_EVENT, envelope);
    return envelope;
  }

  list(filter: EventFilter = {}): EventEnvelope[] {
    const filtered = this.history.filter((event) => this.matches(event, filter));
    const limit = filter.limit && filter.limit > 0 ? Math.min(filter.limit, this.historyLimit) : this.historyLimit;
    return filtered.slice(-limit);
  }

  subscribe(filter: EventFilter = {}): EventStream {
    const matcher = (event: EventEnvelope): boolean => this.matches(event, filter);
    const seed = this.list(filter);
    return new EventStream(this.emitter, matcher, seed, this.streamBufferSize);
  }

  private matches(event: EventEnvelope, filter: EventFilter): boolean {
    if (filter.cats && filter.cats.length > 0 && !filter.cats.includes(event.cat)) {
      return false;
    }
    if (filter.levels && filter.levels.length > 0 && !filter.levels.includes(event.level)) {
      return false;
    }
    if (filter.msgs && filter.msgs.length > 0 && !filter.msgs.includes(event.msg)) {
      return false;
    }
    if (filter.registryId && event.registryId !== filter.registryId) {
      return false;
    }
    if (filter.userId && event.userId !== filter.userId) {
      return false;
    }
    if (filter.owner && event.owner !== filter.owner) {
      return false;
    }
    if (typeof filter.afterSeq === "number" && !(event.seq > filter.afterSeq)) {
      return false;
    }
    return true;
  }

  private dropFromHistory(): void {
    const index = this.history.findIndex((event) => event.level === "info");
    if (index >= 0) {
      this.history.splice(index, 1);
    } else {
      this.history.shift();
    }
  }

  private trimHistory(): void {
    while (this.history.length > this.historyLimit) {
      this.dropFromHistory();
    }
  }
}
