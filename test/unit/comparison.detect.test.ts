import assert from "node:assert/strict";
import test from "node:test";
import { detectComparison } from "../../src/services/plans/comparison.detect";

test("detectComparison finds explicit cues and the compared entities", () => {
  assert.deepEqual(detectComparison("Compare weather in London and Tokyo"), {
    isComparison: true,
    cues: ["compare"],
    entities: ["London", "Tokyo"],
  });
});

test("detectComparison treats joined proper nouns as a comparison", () => {
  assert.deepEqual(detectComparison("What's the weather in London, Paris and Berlin?"), {
    isComparison: true,
    cues: ["joined entities"],
    entities: ["London", "Paris", "Berlin"],
  });
});

test("detectComparison reports vs phrasing without entities when none are capitalised", () => {
  assert.deepEqual(detectComparison("rust vs go"), {
    isComparison: true,
    cues: ["vs"],
    entities: [],
  });
});

test("detectComparison leaves plain lookups alone", () => {
  assert.deepEqual(detectComparison("Tell me about quantum computing"), {
    isComparison: false,
    cues: [],
    entities: [],
  });
});
