import assert from "node:assert/strict";
import test from "node:test";
import { detectEngagementSignals, engagementMultiplier, hasUrgentWording } from "./signals.js";

test("detectEngagementSignals matches whole words only", () => {
  assert.deepEqual(detectEngagementSignals("Could you send pricing and book a call?"), [
    "pricing_inquiry",
    "meeting_request"
  ]);
  assert.deepEqual(detectEngagementSignals("We recall the priceless demos"), []);
  assert.deepEqual(detectEngagementSignals("Happy to see a DEMO"), ["demo_request"]);
});

test("engagementMultiplier takes the strongest signal", () => {
  assert.equal(engagementMultiplier([]), 1);
  assert.equal(engagementMultiplier(["pricing_inquiry"]), 2);
  assert.equal(engagementMultiplier(["pricing_inquiry", "meeting_request", "demo_request"]), 3);
});

test("hasUrgentWording spots urgency phrases", () => {
  assert.equal(hasUrgentWording("Budget approved, let's move"), true);
  assert.equal(hasUrgentWording("Can we talk this week?"), true);
  assert.equal(hasUrgentWording("No rush at all"), false);
});
