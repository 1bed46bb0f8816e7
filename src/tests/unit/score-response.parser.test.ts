import assert from "node:assert/strict";
import { test } from "node:test";
import {
  parseMatchedSkills,
  parseRelevantYears,
  parseScoreResponse,
} from "../../ai/parsers/score-response.parser";

test("parses a score with a denominator", () => {
  assert.deepEqual(parseScoreResponse("SCORE: 12.5/15\nEXPLANATION: Solid leadership.", 15), {
    score: 12.5,
    explanation: "Solid leadership.",
    wellFormed: true,
  });
});

test("accepts indented lines", () => {
  const parsed = parseScoreResponse("  SCORE: 3\n  EXPLANATION: indented", 5);
  assert.equal(parsed.score, 3);
  assert.equal(parsed.explanation, "indented");
});

test("clamps scores into range", () => {
  assert.equal(parseScoreResponse("SCORE: 42\nEXPLANATION: x", 10).score, 10);
  assert.equal(parseScoreResponse("SCORE: -4\nEXPLANATION: x", 10).score, 0);
});

test("salvages the first number from a free-form reply", () => {
  assert.deepEqual(parseScoreResponse("I'd give 7 out of 10", 10), {
    score: 7,
    explanation: "I'd give 7 out of 10",
    wellFormed: false,
  });
});

test("scores 0 when the reply has no number", () => {
  assert.equal(parseScoreResponse("No idea", 5).score, 0);
});

test("parses relevant years", () => {
  assert.deepEqual(parseRelevantYears("RELEVANT_YEARS: 2.5\nEXPLANATION: Two seasons of delivery."), {
    years: 2,
    explanation: "Two seasons of delivery.",
  });
  assert.deepEqual(parseRelevantYears("EXPLANATION: Nothing relevant."), {
    years: 0,
    explanation: "Nothing relevant.",
  });
});

test("rejects a bare zero or an empty reply", () => {
  assert.equal(parseRelevantYears("RELEVANT_YEARS: 0"), null);
  assert.equal(parseRelevantYears("no structure here"), null);
});

test("parses matched skills", () => {
  assert.deepEqual(parseMatchedSkills("MATCHED: [Autonomie, Leadership]"), ["Autonomie", "Leadership"]);
  assert.deepEqual(parseMatchedSkills("MATCHED: []"), []);
  assert.deepEqual(parseMatchedSkills("nothing"), []);
});
