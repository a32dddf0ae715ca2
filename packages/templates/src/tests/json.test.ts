import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { cleanJson, extractJsonObject, parseJsonLenient, validateResponse } from "../json.js";

const Answer = z.object({ a: z.number() });

describe("cleanJson", () => {
  it("strips markdown fences", () => {
    assert.equal(cleanJson('```json\n{"a":1}\n```'), '{"a":1}');
    assert.equal(cleanJson('```\n{"a":1}```  '), '{"a":1}');
    assert.equal(cleanJson('  {"a":1} '), '{"a":1}');
  });
});

describe("extractJsonObject", () => {
  it("takes the outermost braces", () => {
    assert.equal(extractJsonObject('Sure! {"a": {"b": 2}} hope it helps'), '{"a": {"b": 2}}');
    assert.equal(extractJsonObject("no braces here"), null);
    assert.equal(extractJsonObject("} backwards {"), null);
  });
});

describe("parseJsonLenient", () => {
  it("parses clean JSON without marking it repaired", () => {
    assert.deepEqual(parseJsonLenient('{"a":1}'), { ok: true, value: { a: 1 }, repaired: false });
  });

  it("marks fenced JSON as repaired", () => {
    assert.deepEqual(parseJsonLenient('```json\n{"a":1}\n```'), { ok: true, value: { a: 1 }, repaired: true });
  });

  it("falls back to the embedded object", () => {
    assert.deepEqual(
      parseJsonLenient('Here you go: {"a": {"b": 2}} Let me know!'),
      { ok: true, value: { a: { b: 2 } }, repaired: true }
    );
  });

  it("fails on text without JSON", () => {
    const result = parseJsonLenient("I cannot help with that");
    assert.equal(result.ok, false);
  });
});

describe("validateResponse", () => {
  it("returns typed data", () => {
    assert.deepEqual(validateResponse('{"a":3}', Answer), { ok: true, data: { a: 3 }, repaired: false });
  });

  it("lists schema issues by path", () => {
    assert.deepEqual(validateResponse('{"a":"x"}', Answer), { ok: false, issues: ["a: Expected number, received string"] });
    assert.deepEqual(validateResponse("[1]", Answer), { ok: false, issues: ["(root): Expected object, received array"] });
  });

  it("reports unparseable text", () => {
    const result = validateResponse("nope", Answer);
    assert.ok(!result.ok);
    assert.equal(result.issues.length, 1);
    assert.match(result.issues[0] ?? "", /^Response is not valid JSON: /);
  });
});
