import assert from "node:assert/strict";
import test from "node:test";
import {
  bodyToText,
  contentHash,
  levenshteinDistance,
  normalizeBodyForHash,
  normalizeParticipants,
  normalizeSubject,
  subjectThreadKey
} from "./text.js";

test("normalizeSubject strips stacked reply and forward prefixes", () => {
  assert.equal(normalizeSubject("RE: Fwd: re[2]:   Quick   Question "), "quick question");
  assert.equal(normalizeSubject("AW: Angebot"), "angebot");
  assert.equal(normalizeSubject("Regarding pricing"), "regarding pricing");
});

test("normalizeParticipants lowercases, dedupes and sorts", () => {
  assert.deepEqual(normalizeParticipants(["Bob@Example.com", "alice@example.com", "bob@example.com ", ""]), [
    "alice@example.com",
    "bob@example.com"
  ]);
});

test("normalizeBodyForHash drops quoted history and signatures", () => {
  const body = {
    text: [
      "Sounds good, let's talk Tuesday.",
      "",
      "--",
      "Dana",
      "On Mon, Mar 3, 2025 at 9:00 AM Sales <sales@example.com> wrote:",
      "> Are you free this week?"
    ].join("\n")
  };
  assert.equal(normalizeBodyForHash(body), "sounds good, let's talk tuesday.");
});

test("normalizeBodyForHash skips inline quoted lines", () => {
  const body = { text: "Yes please\n> original offer\nSend the deck" };
  assert.equal(normalizeBodyForHash(body), "yes please send the deck");
});

test("contentHash ignores whitespace and quoted differences", () => {
  const first = contentHash({ text: "Not interested, please remove me" });
  const second = contentHash({ text: "  Not interested,\n please remove me\n\nSent from my phone" });
  assert.equal(first, second);
});

test("bodyToText converts html when no text part exists", () => {
  assert.equal(bodyToText({ html: "<p>Count me <b>in</b></p>" }), "Count me in");
  assert.equal(bodyToText({ text: "  plain  ", html: "<p>ignored</p>" }), "plain");
  assert.equal(bodyToText({}), "");
});

test("subjectThreadKey is stable for the same subject and participants", () => {
  const key = subjectThreadKey({ normalizedSubject: "quick question", participants: ["a@x.test", "b@x.test"] });
  assert.match(key, /^thr_[0-9a-f]{24}$/);
  assert.equal(
    key,
    subjectThreadKey({ normalizedSubject: "quick question", participants: ["a@x.test", "b@x.test"] })
  );
  assert.notEqual(key, subjectThreadKey({ normalizedSubject: "quick question", participants: ["a@x.test"] }));
});

test("levenshteinDistance counts edits and stops past the bound", () => {
  assert.equal(levenshteinDistance("kitten", "sitting"), 3);
  assert.equal(levenshteinDistance("spring offer", "spring offers"), 1);
  assert.equal(levenshteinDistance("abc", "abcdefgh", 2), 3);
});
