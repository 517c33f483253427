import { randomUUID } from "node:crypto";

import { EventBus } from "../events/bus.js";
import { StructuredLogger } from "../logger.js";
import { DevCapabilityIssuer, type DevCapability } from "./capability.js";
import { NotOwnerError, ProximityError, UnknownUserError } from "./errors.js";
import { NOOP_JOURNAL, type JournalOperation, type OperationJournal } from "./journal.js";
import { KeyedMutex } from "./mutex.js";
import { NodeChain } from "./nodeChain.js";
import { normaliseIdentity, normaliseNeighbors, normaliseTimestamp } from "./normalise.js";
import { IdentityRegistry } from "./registry.js";
import type { Clock, Identity, NodeSnapshot, PeerRef, RegistrySnapshot, UserRecord } from "./types.js";
import { assertClockMonotonic, assertUpdateAllowed } from "./updateGate.js";

/** Collaborators and policies wired into a deployment at bootstrap. */
export interface ProximityGraphOptions {
  /** Identity deploying the graph; receives the dev capability. */
  deployer: string;
  /** Fallback clock used when an operation omits `now`. */
  clock?: Clock;
  events?: EventBus;
  logger?: StructuredLogger;
  journal?: OperationJournal;
  /**
   * When true, capability-gated updates skip the rate limit. Clock
   * regressions are rejected either way.
   */
  syntheticBypassesGate?: boolean;
  /** Registry identifier override, defaults to a random UUID. */
  registryId?: string;
}

/** Handles returned by {@link bootstrapProximityGraph}. */
export interface ProximityDeployment {
  graph: ProximityGraph;
  /** Delivered to the deployer only; there is no way to mint another one. */
  capability: DevCapability;
}

export interface RegisterUserInput {
  caller: string;
  neighbors?: readonly string[];
  now?: number;
}

export interface UpdateNodeInput {
  userId: string;
  caller: string;
  neighbors: readonly string[];
  now?: number;
}

export interface SpawnSyntheticUserInput {
  capability: DevCapability;
  caller: string;
  target: string;
  neighbors?: readonly string[];
  now?: number;
}

export interface SyntheticUpdateInput {
  capability: DevCapability;
  caller: string;
  userId: string;
  neighbors: readonly string[];
  now?: number;
}

/** Result of a call that created a user record. */
export interface UserCreationResult {
  user: UserRecord;
  snapshot: NodeSnapshot;
}

/** Result of a call that advanced a user record. */
export interface NodeUpdateResult {
  user: UserRecord;
  snapshot: NodeSnapshot;
  /** Snapshot the record pointed at before the update. */
  previous: NodeSnapshot;
}

function cloneUser(record: UserRecord): UserRecord {
  return { ...record, current: { ...record.current } };
}

/**
 * Versioned neighbour-set state for every participant of a deployment.
 *
 * Registrations serialise on the registry key and updates on the user key, so
 * two writers of the same resource never interleave while unrelated
 * resources proceed independently. Every precondition is checked before the
 * first mutation: a rejected call leaves no trace.
 */
export class ProximityGraph {
  private readonly chain = new NodeChain();
  private readonly users = new Map<string, UserRecord>();
  private readonly usersByOwner = new Map<Identity, string[]>();
  private readonly locks = new KeyedMutex();

  private constructor(
    private readonly registry: IdentityRegistry,
    private readonly issuer: DevCapabilityIssuer,
    private readonly clock: Clock,
    private readonly events: EventBus,
    private readonly logger: StructuredLogger,
    private readonly journal: OperationJournal,
    private readonly syntheticBypassesGate: boolean,
  ) {}

  /**
   * Create the registry, mint the dev capability for the deployer and publish
   * the creation event. Each call yields an independent deployment; there is
   * no re-initialisation path for an existing one.
   */
  static async bootstrap(options: ProximityGraphOptions): Promise<ProximityDeployment> {
    const clock = options.clock ?? (() => Date.now());
    const createdAt = normaliseTimestamp(clock());
    const registry = IdentityRegistry.create(options.deployer, createdAt, { id: options.registryId ?? randomUUID() });
    const issuer = new DevCapabilityIssuer();
    const capability = issuer.mint(registry.creator, createdAt);
    const graph = new ProximityGraph(
      registry,
      issuer,
      clock,
      options.events ?? new EventBus({ now: clock }),
      options.logger ?? new StructuredLogger(),
      options.journal ?? NOOP_JOURNAL,
      options.syntheticBypassesGate ?? false,
    );

    graph.events.publish({
      cat: "registry",
      registryId: registry.id,
      owner: registry.creator,
      msg: "registry_created",
      data: { registry_id: registry.id, creator: registry.creator },
      ts: createdAt,
    });
    graph.logger.info("registry_created", { registry_id: registry.id, creator: registry.creator });
    await graph.recordJournal(graph.journalEntry("registry_created", { creator: registry.creator }), createdAt);
    return { graph, capability };
  }

  get registryId(): string {
    return this.registry.id;
  }

  get eventBus(): EventBus {
    return this.events;
  }

  /** Register {@link RegisterUserInput.caller} and publish its first snapshot. */
  async registerUser(input: RegisterUserInput): Promise<UserCreationResult> {
    const caller = normaliseIdentity(input.caller, "caller");
    const neighbors = normaliseNeighbors(input.neighbors ?? []);
    return this.guarded("register_user", { caller }, () =>
      this.locks.runExclusive(`registry:${this.registry.id}`, async () => {
        const now = this.resolveNow(input.now);
        this.registry.register(caller);
        const result = this.createRecord(caller, neighbors, now, false);
        this.logger.info("user_registered", {
          registry_id: this.registry.id,
          user_id: result.user.id,
          owner: caller,
          neighbors: neighbors.length,
          timestamp: now,
        });
        await this.recordJournal(
          this.journalEntry("user_registered", { user_id: result.user.id, owner: caller, snapshot_id: result.snapshot.id }),
          now,
        );
        return result;
      }),
    );
  }

  /** Advance the caller's own record to a new snapshot. */
  async updateNode(input: UpdateNodeInput): Promise<NodeUpdateResult> {
    const caller = normaliseIdentity(input.caller, "caller");
    const neighbors = normaliseNeighbors(input.neighbors);
    return this.guarded("update_node", { caller, user_id: input.userId }, () =>
      this.locks.runExclusive(`user:${input.userId}`, async () => {
        const now = this.resolveNow(input.now);
        const record = this.requireUser(input.userId);
        if (record.owner !== caller) {
          throw new NotOwnerError(record.id, record.owner, caller);
        }
        assertUpdateAllowed(now, record.current.timestamp);
        const result = this.advanceRecord(record, neighbors, now);
        this.logger.info("node_updated", {
          user_id: record.id,
          owner: record.owner,
          snapshot_id: result.snapshot.id,
          previous_id: result.previous.id,
          timestamp: now,
        });
        await this.recordJournal(
          this.journalEntry("node_updated", {
            user_id: record.id,
            snapshot_id: result.snapshot.id,
            previous_id: result.previous.id,
          }),
          now,
        );
        return result;
      }),
    );
  }

  /**
   * Create a record for {@link SpawnSyntheticUserInput.target} without touching
   * the registry. The target may still register normally afterwards.
   */
  async spawnSyntheticUser(input: SpawnSyntheticUserInput): Promise<UserCreationResult> {
    const caller = normaliseIdentity(input.caller, "caller");
    const target = normaliseIdentity(input.target, "target");
    const neighbors = normaliseNeighbors(input.neighbors ?? []);
    return this.guarded("spawn_synthetic_user", { caller, target }, () =>
      this.locks.runExclusive(`capability:${input.capability.id}`, async () => {
        this.issuer.assertHeldBy(input.capability, caller);
        const now = this.resolveNow(input.now);
        const result = this.createRecord(target, neighbors, now, true);
        this.logger.info("synthetic_user_spawned", {
          registry_id: this.registry.id,
          user_id: result.user.id,
          owner: target,
          neighbors: neighbors.length,
          timestamp: now,
        });
        await this.recordJournal(
          this.journalEntry("synthetic_user_spawned", {
            user_id: result.user.id,
            owner: target,
            snapshot_id: result.snapshot.id,
          }),
          now,
        );
        return result;
      }),
    );
  }

  /** Advance any record on behalf of the capability holder. */
  async syntheticUpdate(input: SyntheticUpdateInput): Promise<NodeUpdateResult> {
    const caller = normaliseIdentity(input.caller, "caller");
    const neighbors = normaliseNeighbors(input.neighbors);
    return this.guarded("synthetic_update", { caller, user_id: input.userId }, () =>
      this.locks.runExclusive(`user:${input.userId}`, async () => {
        this.issuer.assertHeldBy(input.capability, caller);
        const now = this.resolveNow(input.now);
        const record = this.requireUser(input.userId);
        if (this.syntheticBypassesGate) {
          assertClockMonotonic(now, record.current.timestamp);
        } else {
          assertUpdateAllowed(now, record.current.timestamp);
        }
        const result = this.advanceRecord(record, neighbors, now);
        this.logger.info("synthetic_node_updated", {
          user_id: record.id,
          owner: record.owner,
          snapshot_id: result.snapshot.id,
          previous_id: result.previous.id,
          timestamp: now,
        });
        await this.recordJournal(
          this.journalEntry("synthetic_node_updated", {
            user_id: record.id,
            snapshot_id: result.snapshot.id,
            previous_id: result.previous.id,
          }),
          now,
        );
        return result;
      }),
    );
  }

  getUser(userId: string): UserRecord {
    return cloneUser(this.requireUser(userId));
  }

  /** Records owned by {@link identity}, real and synthetic, in creation order. */
  findUsersByOwner(identity: string): UserRecord[] {
    const ids = this.usersByOwner.get(identity.trim()) ?? [];
    return ids.map((id) => this.getUser(id));
  }

  listUsers(): UserRecord[] {
    return [...this.users.values()].map(cloneUser);
  }

  getSnapshot(snapshotId: number): NodeSnapshot {
    return this.chain.get(snapshotId);
  }

  /** Snapshots of the record from head to root, newest first. */
  history(userId: string): NodeSnapshot[] {
    return this.chain.history(this.requireUser(userId).head);
  }

  get snapshotCount(): number {
    return this.chain.size;
  }

  isRegistered(identity: string): boolean {
    return this.registry.has(identity);
  }

  describeRegistry(): RegistrySnapshot {
    return this.registry.describe();
  }

  private createRecord(owner: Identity, neighbors: PeerRef[], now: number, synthetic: boolean): UserCreationResult {
    const snapshot = this.chain.append({ owner, neighbors, timestamp: now, previous: null });
    const record: UserRecord = {
      id: randomUUID(),
      owner,
      synthetic,
      head: snapshot.id,
      current: { neighbors: snapshot.neighbors, timestamp: snapshot.timestamp },
      chainLength: 1,
    };
    this.users.set(record.id, record);
    const owned = this.usersByOwner.get(owner) ?? [];
    owned.push(record.id);
    this.usersByOwner.set(owner, owned);

    this.events.publish({
      cat: "user",
      registryId: this.registry.id,
      userId: record.id,
      owner,
      msg: "new_user",
      data: { owner, user_id: record.id, synthetic },
      ts: now,
    });
    this.publishNodeUpdate(record, snapshot);
    return { user: cloneUser(record), snapshot };
  }

  private advanceRecord(record: UserRecord, neighbors: PeerRef[], now: number): NodeUpdateResult {
    const previous = this.chain.get(record.head);
    const snapshot = this.chain.append({ owner: record.owner, neighbors, timestamp: now, previous: previous.id });
    record.head = snapshot.id;
    record.current = { neighbors: snapshot.neighbors, timestamp: snapshot.timestamp };
    record.chainLength += 1;
    this.publishNodeUpdate(record, snapshot);
    return { user: cloneUser(record), snapshot, previous };
  }

  private publishNodeUpdate(record: UserRecord, snapshot: NodeSnapshot): void {
    this.events.publish({
      cat: "node",
      registryId: this.registry.id,
      userId: record.id,
      owner: record.owner,
      msg: "node_update",
      data: { user_id: record.id, current_node: snapshot.id, timestamp: snapshot.timestamp },
      ts: snapshot.timestamp,
    });
  }

  private requireUser(userId: string): UserRecord {
    const record = this.users.get(userId);
    if (!record) {
      throw new UnknownUserError(userId);
    }
    return record;
  }

  private resolveNow(now: number | undefined): number {
    return normaliseTimestamp(now ?? this.clock());
  }

  private journalEntry(kind: JournalOperation["kind"], fields: Record<string, unknown>): JournalOperation {
    return { ...fields, kind, registry_id: this.registry.id };
  }

  /**
   * Journal entries follow a committed operation, so a failing sink is
   * reported and never turns the call into a rejection.
   */
  private async recordJournal(operation: JournalOperation, timestamp: number): Promise<void> {
    try {
      await this.journal.record(operation, timestamp);
    } catch (error) {
      this.logger.error("journal_append_failed", {
        kind: operation.kind,
        registry_id: this.registry.id,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /** Logs rejected operations with their stable code before rethrowing. */
  private async guarded<T>(operation: string, context: Record<string, unknown>, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof ProximityError) {
        this.logger.warn(`${operation}_rejected`, { ...context, code: error.code, message: error.message });
      }
      throw error;
    }
  }
}

/** Entry point wiring a new deployment; see {@link ProximityGraph.bootstrap}. */
export function bootstrapProximityGraph(options: ProximityGraphOptions): Promise<ProximityDeployment> {
  return ProximityGraph.bootstrap(options);
}
