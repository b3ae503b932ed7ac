import assert from "node:assert/strict";
import test from "node:test";
import { JsonBlockParseError, parseSingleJsonBlock } from "../../src/services/llm/json.parse";

function assertParseCode(raw: string, code: JsonBlockParseError["code"]) {
  assert.throws(
    () => parseSingleJsonBlock(raw),
    (error: unknown) => error instanceof JsonBlockParseError && error.code === code,
  );
}

test("parseSingleJsonBlock accepts raw JSON objects", () => {
  assert.deepEqual(parseSingleJsonBlock(' {"intent":"search"} '), { intent: "search" });
});

test("parseSingleJsonBlock accepts a single fenced json block", () => {
  const raw = "```json\n{\"steps\":[]}\n```";
  assert.deepEqual(parseSingleJsonBlock(raw), { steps: [] });
});

test("parseSingleJsonBlock rejects prose around the block", () => {
  assertParseCode("Here is the plan:\n```json\n{\"steps\":[]}\n```", "LLM_OUTPUT_NONJSON");
});

test("parseSingleJsonBlock rejects multiple fenced blocks", () => {
  assertParseCode("```json\n{}\n```\n```json\n{}\n```", "LLM_OUTPUT_MULTIBLOCK");
});

test("parseSingleJsonBlock rejects non-json fences and arrays", () => {
  assertParseCode("```yaml\nsteps: []\n```", "LLM_OUTPUT_NONJSON");
  assertParseCode("```json\n[1, 2]\n```", "LLM_OUTPUT_NOT_OBJECT");
  assertParseCode("", "LLM_OUTPUT_NONJSON");
  assertParseCode("{not json}", "LLM_OUTPUT_NONJSON");
});
