import { describe, it } from "mocha";
import { expect } from "chai";

import { AlreadyRegisteredError, UpdateTooSoonError } from "../src/proximity/errors.js";
import { KeyedMutex } from "../src/proximity/mutex.js";
import { createTestDeployment } from "./helpers/proximity.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("proximity concurrency", () => {
  it("lets exactly one of two racing registrations of the same identity win", async () => {
    const { graph } = await createTestDeployment();

    const results = await Promise.allSettled([
      graph.registerUser({ caller: "A", neighbors: ["B"], now: 0 }),
      graph.registerUser({ caller: "A", neighbors: ["C"], now: 0 }),
    ]);

    const fulfilled = results.filter((result) => result.status === "fulfilled");
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    expect(fulfilled).to.have.length(1);
    expect(rejected).to.have.length(1);
    expect(rejected[0].reason).to.be.instanceOf(AlreadyRegisteredError);
    expect(graph.describeRegistry().registeredUsers).to.deep.equal(["A"]);
    expect(graph.listUsers()).to.have.length(1);
  });

  it("registers distinct identities racing each other", async () => {
    const { graph } = await createTestDeployment();

    await Promise.all([
      graph.registerUser({ caller: "A", now: 0 }),
      graph.registerUser({ caller: "B", now: 0 }),
      graph.registerUser({ caller: "C", now: 0 }),
    ]);

    expect(graph.describeRegistry().registeredUsers).to.deep.equal(["A", "B", "C"]);
    expect(graph.snapshotCount).to.equal(3);
  });

  it("serialises racing updates of the same record", async () => {
    const { graph } = await createTestDeployment();
    const { user } = await graph.registerUser({ caller: "A", now: 0 });

    const results = await Promise.allSettled([
      graph.updateNode({ userId: user.id, caller: "A", neighbors: ["B"], now: 10_000 }),
      graph.updateNode({ userId: user.id, caller: "A", neighbors: ["C"], now: 10_000 }),
    ]);

    expect(results[0].status).to.equal("fulfilled");
    expect(results[1].status).to.equal("rejected");
    if (results[1].status === "rejected") {
      expect(results[1].reason).to.be.instanceOf(UpdateTooSoonError);
    }
    expect(graph.getUser(user.id).current).to.deep.equal({ neighbors: ["B"], timestamp: 10_000 });
    expect(graph.history(user.id)).to.have.length(2);
  });

  it("updates different records independently", async () => {
    const { graph } = await createTestDeployment();
    const alice = await graph.registerUser({ caller: "A", now: 0 });
    const bob = await graph.registerUser({ caller: "B", now: 0 });

    const [first, second] = await Promise.all([
      graph.updateNode({ userId: alice.user.id, caller: "A", neighbors: ["B"], now: 10_000 }),
      graph.updateNode({ userId: bob.user.id, caller: "B", neighbors: ["A"], now: 10_000 }),
    ]);

    expect(first.user.chainLength).to.equal(2);
    expect(second.user.chainLength).to.equal(2);
  });
});

describe("keyed mutex", () => {
  it("runs operations on the same key one after the other", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive("k", async () => {
        order.push("first:start");
        await delay(5);
        order.push("first:end");
      }),
      mutex.runExclusive("k", async () => {
        order.push("second:start");
        order.push("second:end");
      }),
    ]);

    expect(order).to.deep.equal(["first:start", "first:end", "second:start", "second:end"]);
    expect(mutex.activeKeys).to.equal(0);
  });

  it("does not block unrelated keys", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive("a", async () => {
        await delay(10);
        order.push("a");
      }),
      mutex.runExclusive("b", async () => {
        order.push("b");
      }),
    ]);

    expect(order).to.deep.equal(["b", "a"]);
  });

  it("releases the key when an operation throws", async () => {
    const mutex = new KeyedMutex();

    let caught: unknown;
    try {
      await mutex.runExclusive("k", () => {
        throw new Error("boom");
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(Error);
    expect(await mutex.runExclusive("k", () => "next")).to.equal("next");
    expect(mutex.activeKeys).to.equal(0);
  });
});
