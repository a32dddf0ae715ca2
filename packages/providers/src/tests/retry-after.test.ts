import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseRetryAfter } from "../retry-after.js";

const NOW = Date.parse("2026-01-01T00:00:00Z");

describe("parseRetryAfter", () => {
  it("reads delta seconds", () => {
    assert.equal(parseRetryAfter(new Headers({ "retry-after": "2" }), NOW), 2_000);
    assert.equal(parseRetryAfter(new Headers({ "retry-after": "1.5" }), NOW), 1_500);
  });

  it("prefers the millisecond header", () => {
    assert.equal(parseRetryAfter(new Headers({ "retry-after": "2", "retry-after-ms": "250" }), NOW), 250);
  });

  it("reads HTTP dates relative to now", () => {
    assert.equal(parseRetryAfter(new Headers({ "retry-after": "Thu, 01 Jan 2026 00:00:10 GMT" }), NOW), 10_000);
    assert.equal(parseRetryAfter(new Headers({ "retry-after": "Wed, 31 Dec 2025 23:59:00 GMT" }), NOW), 0);
  });

  it("ignores missing or unparseable values", () => {
    assert.equal(parseRetryAfter(new Headers(), NOW), undefined);
    assert.equal(parseRetryAfter(new Headers({ "retry-after": "soon" }), NOW), undefined);
    assert.equal(parseRetryAfter(new Headers({ "retry-after-ms": "-5" }), NOW), undefined);
  });
});
