import assert from "node:assert/strict";
import test from "node:test";
import {
  CapabilityTimeoutError,
  MalformedInputError,
  StateCorruptionError,
  TransientCapabilityError,
  isStoreLevelCorruption,
  serializeError,
  toFailureCode,
  toTransientCapabilityError,
  withTimeout
} from "./errors.js";

test("toFailureCode maps known errors", () => {
  assert.equal(toFailureCode(new MalformedInputError({ field: "sender", messageId: "m-1" })), "MALFORMED_INPUT");
  assert.equal(
    toFailureCode(new StateCorruptionError({ scope: "thread", threadKey: "thr_1", detail: "bad order" })),
    "STATE_CORRUPTION"
  );
  assert.equal(toFailureCode(new Error("boom")), "UNEXPECTED");
});

test("isStoreLevelCorruption only matches store scope", () => {
  assert.equal(isStoreLevelCorruption(new StateCorruptionError({ scope: "store", detail: "double commit" })), true);
  assert.equal(
    isStoreLevelCorruption(new StateCorruptionError({ scope: "thread", threadKey: "thr_1", detail: "x" })),
    false
  );
  assert.equal(isStoreLevelCorruption(new Error("store")), false);
});

test("MalformedInputError names the missing field", () => {
  const error = new MalformedInputError({ field: "body", messageId: "m-9" });
  assert.equal(error.message, "Malformed message m-9: missing body");
  assert.equal(error.field, "body");
});

test("toTransientCapabilityError keeps existing wrappers and classifies the rest", () => {
  const existing = new TransientCapabilityError({ capability: "inference", reason: "timeout" });
  assert.equal(toTransientCapabilityError("inference", existing), existing);

  const wrapped = toTransientCapabilityError("directory", new Error("boom"));
  assert.equal(wrapped.capability, "directory");
  assert.equal(wrapped.message, "directory failed: default_permanent: boom");
});

test("withTimeout rejects slow calls and aborts their signal", async () => {
  let aborted = false;
  await assert.rejects(
    withTimeout({
      capability: "inference",
      timeoutMs: 10,
      run: (signal) =>
        new Promise<string>(() => {
          signal.addEventListener("abort", () => {
            aborted = true;
          });
        })
    }),
    (error: unknown) => error instanceof CapabilityTimeoutError && error.timeoutMs === 10
  );
  assert.equal(aborted, true);
});

test("withTimeout returns fast results", async () => {
  const value = await withTimeout({ capability: "directory", timeoutMs: 1000, run: async () => 42 });
  assert.equal(value, 42);
});

test("serializeError truncates long fields", () => {
  const error = new Error("x".repeat(700));
  error.stack = "s".repeat(2500);

  const serialized = serializeError(error);
  assert.equal(serialized.name, "Error");
  assert.equal(serialized.message.length, 501);
  assert.equal(serialized.stack?.length, 2001);
  assert.deepEqual(serializeError("plain"), { name: "UnknownError", message: "plain" });
});
