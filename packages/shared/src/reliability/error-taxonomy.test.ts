import assert from "node:assert/strict";
import test from "node:test";
import { ErrorClass, classifyError } from "./error-taxonomy.js";

test("classifyError treats network codes and aborts as transient", () => {
  const reset = Object.assign(new Error("socket hang up"), { code: "econnreset" });
  assert.deepEqual(classifyError(reset), {
    class: ErrorClass.TRANSIENT,
    reason: "network_code",
    code: "ECONNRESET",
    httpStatus: undefined
  });

  const aborted = new Error("The operation was aborted");
  aborted.name = "AbortError";
  assert.equal(classifyError(aborted).class, ErrorClass.TRANSIENT);
  assert.equal(classifyError(aborted).reason, "timeout_or_abort");
});

test("classifyError maps http statuses", () => {
  assert.equal(classifyError({ status: 429 }).reason, "http_retryable_status");
  assert.equal(classifyError({ statusCode: 503 }).class, ErrorClass.TRANSIENT);
  assert.equal(classifyError({ response: { status: 401 } }).reason, "http_client_error");
});

test("classifyError flags quota exhaustion without a status as transient", () => {
  const result = classifyError(new Error("You exceeded your current quota"));
  assert.equal(result.class, ErrorClass.TRANSIENT);
  assert.equal(result.reason, "quota_exhausted");
});

test("classifyError ignores unique violations", () => {
  assert.equal(classifyError({ code: "23505", message: "dup" }).class, ErrorClass.IGNORE);
});

test("classifyError defaults to permanent", () => {
  assert.equal(classifyError("boom").class, ErrorClass.PERMANENT);
  assert.equal(classifyError(new TypeError("bad input")).reason, "default_permanent");
});
