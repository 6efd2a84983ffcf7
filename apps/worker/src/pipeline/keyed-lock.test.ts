import assert from "node:assert/strict";
import test from "node:test";
import { KeyedLock } from "./keyed-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

test("runExclusive serializes work on the same key", async () => {
  const lock = new KeyedLock();
  const gate = deferred();
  const order: string[] = [];

  const first = lock.runExclusive("lead:1", async () => {
    order.push("first:start");
    await gate.promise;
    order.push("first:end");
  });
  const second = lock.runExclusive("lead:1", async () => {
    order.push("second");
  });

  await Promise.resolve();
  gate.resolve();
  await Promise.all([first, second]);

  assert.deepEqual(order, ["first:start", "first:end", "second"]);
  assert.equal(lock.size, 0);
});

test("runExclusive does not block other keys", async () => {
  const lock = new KeyedLock();
  const gate = deferred();

  const blocked = lock.runExclusive("lead:1", () => gate.promise);
  const other = await lock.runExclusive("lead:2", async () => "done");

  assert.equal(other, "done");
  gate.resolve();
  await blocked;
});

test("runExclusive releases the key when the task throws", async () => {
  const lock = new KeyedLock();

  await assert.rejects(
    lock.runExclusive("thread:1", async () => {
      throw new Error("boom");
    }),
    /boom/
  );
  assert.equal(await lock.runExclusive("thread:1", async () => 42), 42);
  assert.equal(lock.size, 0);
});
