import { describe, it } from "mocha";
import { expect } from "chai";

import {
  AlreadyRegisteredError,
  CapabilityMismatchError,
  ClockRegressionError,
  InvalidProximityInputError,
  NotOwnerError,
  UnknownUserError,
  UpdateTooSoonError,
} from "../src/proximity/errors.js";
import { auditGraph } from "../src/proximity/invariants.js";
import type { OperationJournal } from "../src/proximity/journal.js";
import { ERROR_CODES } from "../src/types.js";
import { captureRejection, createTestDeployment } from "./helpers/proximity.js";

describe("proximity graph", () => {
  describe("bootstrap", () => {
    it("creates an empty registry and hands the capability to the deployer", async () => {
      const { graph, capability, events } = await createTestDeployment({ deployer: "root", startAt: 500 });

      expect(graph.registryId).to.equal("registry-test");
      expect(graph.describeRegistry()).to.deep.equal({
        id: "registry-test",
        creator: "root",
        createdAt: 500,
        registeredUsers: [],
      });
      expect(capability.owner).to.equal("root");
      expect(capability.mintedAt).to.equal(500);
      expect(graph.eventBus).to.equal(events);

      const [created] = events.list();
      expect(created.msg).to.equal("registry_created");
      expect(created.cat).to.equal("registry");
      expect(created.ts).to.equal(500);
      expect(created.data).to.deep.equal({ registry_id: "registry-test", creator: "root" });
    });

    it("yields independent deployments on every call", async () => {
      const first = await createTestDeployment();
      const second = await createTestDeployment();

      await first.graph.registerUser({ caller: "A", now: 0 });

      expect(first.graph.isRegistered("A")).to.equal(true);
      expect(second.graph.isRegistered("A")).to.equal(false);
      const error = await captureRejection(
        first.graph.spawnSyntheticUser({ capability: second.capability, caller: "deployer", target: "B", now: 0 }),
      );
      expect(error).to.be.instanceOf(CapabilityMismatchError);
    });
  });

  describe("documented scenarios", () => {
    it("registers, rate limits and extends a chain", async () => {
      const { graph } = await createTestDeployment();

      const registered = await graph.registerUser({ caller: "A", neighbors: [], now: 0 });
      expect(registered.user.current).to.deep.equal({ neighbors: [], timestamp: 0 });
      expect(registered.user.owner).to.equal("A");
      expect(registered.user.synthetic).to.equal(false);
      expect(graph.describeRegistry().registeredUsers).to.deep.equal(["A"]);

      const userId = registered.user.id;
      const tooSoon = await captureRejection(graph.updateNode({ userId, caller: "A", neighbors: ["B"], now: 5_000 }));
      expect(tooSoon).to.be.instanceOf(UpdateTooSoonError);

      const third = await graph.updateNode({ userId, caller: "A", neighbors: ["B"], now: 10_000 });
      expect(third.user.current).to.deep.equal({ neighbors: ["B"], timestamp: 10_000 });
      expect(third.user.chainLength).to.equal(2);

      await graph.updateNode({ userId, caller: "A", neighbors: ["B", "C"], now: 20_001 });
      await graph.updateNode({ userId, caller: "A", neighbors: ["D"], now: 30_002 });

      const history = graph.history(userId);
      expect(graph.getUser(userId).chainLength).to.equal(4);
      expect(history).to.have.length(4);
      expect(history[1].neighbors).to.deep.equal(["B", "C"]);
      expect(history.map((snapshot) => snapshot.timestamp)).to.deep.equal([30_002, 20_001, 10_000, 0]);
    });

    it("refuses updates from anyone but the owner", async () => {
      const { graph, events } = await createTestDeployment();
      const { user } = await graph.registerUser({ caller: "A", neighbors: ["B"], now: 0 });
      const before = graph.getUser(user.id);
      const snapshots = graph.snapshotCount;
      const published = events.list().length;

      const error = await captureRejection(
        graph.updateNode({ userId: user.id, caller: "D", neighbors: ["E"], now: 50_000 }),
      );

      expect(error).to.be.instanceOf(NotOwnerError);
      if (error instanceof NotOwnerError) {
        expect(error.code).to.equal(ERROR_CODES.NODE_NOT_OWNER);
        expect(error.details).to.deep.equal({ userId: user.id, owner: "A", caller: "D" });
      }
      expect(graph.getUser(user.id)).to.deep.equal(before);
      expect(graph.snapshotCount).to.equal(snapshots);
      expect(events.list()).to.have.length(published);
    });

    it("refuses synthetic spawns from non holders without touching state", async () => {
      const { graph, capability } = await createTestDeployment();

      const error = await captureRejection(
        graph.spawnSyntheticUser({ capability, caller: "mallory", target: "A", neighbors: ["B"], now: 0 }),
      );

      expect(error).to.be.instanceOf(CapabilityMismatchError);
      expect(graph.describeRegistry().registeredUsers).to.deep.equal([]);
      expect(graph.snapshotCount).to.equal(0);
      expect(graph.listUsers()).to.deep.equal([]);
    });
  });

  describe("registration", () => {
    it("rejects a second registration and keeps the registry size", async () => {
      const { graph } = await createTestDeployment();
      await graph.registerUser({ caller: "A", now: 0 });

      const error = await captureRejection(graph.registerUser({ caller: " A ", neighbors: ["B"], now: 1 }));

      expect(error).to.be.instanceOf(AlreadyRegisteredError);
      expect(graph.describeRegistry().registeredUsers).to.deep.equal(["A"]);
      expect(graph.listUsers()).to.have.length(1);
      expect(graph.snapshotCount).to.equal(1);
    });

    it("publishes the user and its first node in order", async () => {
      const { graph, events } = await createTestDeployment();
      const { user, snapshot } = await graph.registerUser({ caller: "A", neighbors: ["B", "C"], now: 7 });

      const published = events.list({ cats: ["user", "node"] });
      expect(published.map((event) => event.msg)).to.deep.equal(["new_user", "node_update"]);
      expect(published[0].data).to.deep.equal({ owner: "A", user_id: user.id, synthetic: false });
      expect(published[1].data).to.deep.equal({ user_id: user.id, current_node: snapshot.id, timestamp: 7 });
      expect(published[1].userId).to.equal(user.id);
      expect(published[1].registryId).to.equal("registry-test");
    });

    it("falls back to the deployment clock when no timestamp is supplied", async () => {
      const { graph, clock } = await createTestDeployment({ startAt: 2_000 });

      const { user } = await graph.registerUser({ caller: "A" });
      expect(user.current.timestamp).to.equal(2_000);

      clock.advance(10_000);
      const updated = await graph.updateNode({ userId: user.id, caller: "A", neighbors: [] });
      expect(updated.snapshot.timestamp).to.equal(12_000);
    });

    it("trims neighbour references and rejects empty ones", async () => {
      const { graph } = await createTestDeployment();

      const { user } = await graph.registerUser({ caller: "A", neighbors: [" B ", "C"], now: 0 });
      expect(user.current.neighbors).to.deep.equal(["B", "C"]);

      const error = await captureRejection(graph.registerUser({ caller: "Z", neighbors: ["B", " "], now: 0 }));
      expect(error).to.be.instanceOf(InvalidProximityInputError);
      if (error instanceof InvalidProximityInputError) {
        expect(error.message).to.equal("neighbor at index 1 must be a non-empty string");
      }
      expect(graph.isRegistered("Z")).to.equal(false);
    });

    it("rejects timestamps that are not non-negative integers", async () => {
      const { graph } = await createTestDeployment();

      const error = await captureRejection(graph.registerUser({ caller: "A", now: -1 }));

      expect(error).to.be.instanceOf(InvalidProximityInputError);
      expect(graph.isRegistered("A")).to.equal(false);
    });
  });

  describe("updates", () => {
    it("links every new snapshot to the previous head", async () => {
      const { graph } = await createTestDeployment();
      const { user } = await graph.registerUser({ caller: "A", now: 0 });

      let head = user.head;
      const updates = 5;
      for (let index = 1; index <= updates; index += 1) {
        const neighbors = index % 2 === 0 ? [] : [`peer-${index}`];
        const result = await graph.updateNode({ userId: user.id, caller: "A", neighbors, now: index * 10_000 });
        expect(result.snapshot.previous).to.equal(head);
        expect(result.previous.id).to.equal(head);
        expect(result.user.current).to.deep.equal({ neighbors, timestamp: index * 10_000 });
        head = result.snapshot.id;
      }

      const history = graph.history(user.id);
      expect(history).to.have.length(updates + 1);
      for (let index = 1; index < history.length; index += 1) {
        expect(history[index].timestamp).to.be.lessThan(history[index - 1].timestamp);
      }
    });

    it("rejects clock regressions instead of treating them as elapsed time", async () => {
      const { graph } = await createTestDeployment();
      const { user } = await graph.registerUser({ caller: "A", now: 50_000 });

      const error = await captureRejection(graph.updateNode({ userId: user.id, caller: "A", neighbors: [], now: 1_000 }));

      expect(error).to.be.instanceOf(ClockRegressionError);
      expect(graph.getUser(user.id).chainLength).to.equal(1);
    });

    it("reports unknown records", async () => {
      const { graph } = await createTestDeployment();

      const error = await captureRejection(graph.updateNode({ userId: "missing", caller: "A", neighbors: [], now: 0 }));

      expect(error).to.be.instanceOf(UnknownUserError);
      expect(() => graph.getUser("missing")).to.throw(UnknownUserError, "user 'missing' not found");
    });

    it("logs rejected operations with their code", async () => {
      const { graph, entries } = await createTestDeployment();
      const { user } = await graph.registerUser({ caller: "A", now: 0 });

      await captureRejection(graph.updateNode({ userId: user.id, caller: "A", neighbors: [], now: 1 }));

      const rejected = entries.find((entry) => entry.message === "update_node_rejected");
      expect(rejected?.level).to.equal("warn");
      expect(rejected?.payload).to.deep.equal({
        caller: "A",
        user_id: user.id,
        code: ERROR_CODES.NODE_TOO_SOON,
        message: "node update rate limited",
      });
    });

    it("hands out copies of user records", async () => {
      const { graph } = await createTestDeployment();
      const { user } = await graph.registerUser({ caller: "A", now: 0 });

      const copy = graph.getUser(user.id);
      copy.chainLength = 99;
      copy.current.timestamp = 99;

      expect(graph.getUser(user.id).chainLength).to.equal(1);
      expect(graph.getUser(user.id).current.timestamp).to.equal(0);
    });
  });

  describe("synthetic users", () => {
    it("spawns records without registering the target", async () => {
      const { graph, capability, events } = await createTestDeployment();

      const spawned = await graph.spawnSyntheticUser({
        capability,
        caller: "deployer",
        target: "A",
        neighbors: ["B"],
        now: 100,
      });

      expect(spawned.user.synthetic).to.equal(true);
      expect(spawned.user.owner).to.equal("A");
      expect(graph.isRegistered("A")).to.equal(false);
      expect(events.list({ msgs: ["new_user"] })[0].data).to.deep.equal({
        owner: "A",
        user_id: spawned.user.id,
        synthetic: true,
      });

      const registered = await graph.registerUser({ caller: "A", now: 200 });
      expect(graph.findUsersByOwner("A").map((record) => record.id)).to.deep.equal([
        spawned.user.id,
        registered.user.id,
      ]);
    });

    it("lets the owner of a synthetic record update it", async () => {
      const { graph, capability } = await createTestDeployment();
      const { user } = await graph.spawnSyntheticUser({ capability, caller: "deployer", target: "A", now: 0 });

      const result = await graph.updateNode({ userId: user.id, caller: "A", neighbors: ["C"], now: 10_000 });

      expect(result.user.chainLength).to.equal(2);
    });

    it("updates any record for the holder while keeping the rate limit", async () => {
      const { graph, capability } = await createTestDeployment();
      const { user } = await graph.registerUser({ caller: "A", now: 0 });

      const early = await captureRejection(
        graph.syntheticUpdate({ capability, caller: "deployer", userId: user.id, neighbors: ["X"], now: 5_000 }),
      );
      expect(early).to.be.instanceOf(UpdateTooSoonError);

      const result = await graph.syntheticUpdate({
        capability,
        caller: "deployer",
        userId: user.id,
        neighbors: ["X"],
        now: 10_000,
      });
      expect(result.user.owner).to.equal("A");
      expect(result.snapshot.owner).to.equal("A");
      expect(result.user.current).to.deep.equal({ neighbors: ["X"], timestamp: 10_000 });
    });

    it("skips the rate limit when configured but still rejects regressions", async () => {
      const { graph, capability } = await createTestDeployment({ syntheticBypassesGate: true });
      const { user } = await graph.registerUser({ caller: "A", now: 5_000 });

      const quick = await graph.syntheticUpdate({
        capability,
        caller: "deployer",
        userId: user.id,
        neighbors: [],
        now: 5_001,
      });
      expect(quick.user.chainLength).to.equal(2);

      const error = await captureRejection(
        graph.syntheticUpdate({ capability, caller: "deployer", userId: user.id, neighbors: [], now: 4_000 }),
      );
      expect(error).to.be.instanceOf(ClockRegressionError);

      const stalled = await captureRejection(
        graph.syntheticUpdate({ capability, caller: "deployer", userId: user.id, neighbors: ["B"], now: 5_001 }),
      );
      expect(stalled).to.be.instanceOf(ClockRegressionError);
      if (stalled instanceof ClockRegressionError) {
        expect(stalled.message).to.equal("clock did not advance");
      }
      expect(graph.history(user.id).map((snapshot) => snapshot.timestamp)).to.deep.equal([5_001, 5_000]);
      expect(auditGraph(graph)).to.deep.equal({ ok: true });

      const owner = await captureRejection(
        graph.updateNode({ userId: user.id, caller: "A", neighbors: [], now: 5_002 }),
      );
      expect(owner).to.be.instanceOf(UpdateTooSoonError);
    });

    it("refuses synthetic updates from non holders", async () => {
      const { graph, capability } = await createTestDeployment();
      const { user } = await graph.registerUser({ caller: "A", now: 0 });

      const error = await captureRejection(
        graph.syntheticUpdate({ capability, caller: "A", userId: user.id, neighbors: [], now: 20_000 }),
      );

      expect(error).to.be.instanceOf(CapabilityMismatchError);
      expect(graph.getUser(user.id).chainLength).to.equal(1);
    });
  });

  describe("journal sink", () => {
    it("resolves committed operations when the journal rejects", async () => {
      const journal: OperationJournal = {
        async record(operation) {
          if (operation.kind !== "registry_created") {
            throw new Error("disk full");
          }
        },
      };
      const { graph, entries } = await createTestDeployment({ journal });

      const { user } = await graph.registerUser({ caller: "A", now: 0 });
      const updated = await graph.updateNode({ userId: user.id, caller: "A", neighbors: ["B"], now: 10_000 });

      expect(updated.user.chainLength).to.equal(2);
      expect(graph.isRegistered("A")).to.equal(true);
      expect(graph.listUsers()).to.have.length(1);
      const failures = entries.filter((entry) => entry.message === "journal_append_failed");
      expect(failures.map((entry) => entry.payload)).to.deep.equal([
        { kind: "user_registered", registry_id: "registry-test", message: "disk full" },
        { kind: "node_updated", registry_id: "registry-test", message: "disk full" },
      ]);
      expect(entries.some((entry) => entry.message === "register_user_rejected")).to.equal(false);
    });
  });
});
