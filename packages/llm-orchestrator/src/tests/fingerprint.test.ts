import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { canonicalJson, fingerprint, fingerprintPrefix } from "../fingerprint.js";
import { FingerprintError } from "../errors.js";

const HASH = /[0-9a-f]{64}$/;

describe("fingerprint", () => {
  it("is stable across key order and whitespace", () => {
    const a = fingerprint(
      "openai",
      { messages: [{ role: "user", content: "Hello   world " }] },
      { temperature: 0.2, model: "gpt-4o-mini" }
    );
    const b = fingerprint(
      "openai",
      { messages: [{ content: "Hello world", role: "user" }] },
      { model: "gpt-4o-mini", temperature: 0.2 }
    );
    assert.equal(a, b);
  });

  it("separates distinct payloads, params and providers", () => {
    const payload = { messages: [{ role: "user", content: "laptops under 1000" }] };
    const base = fingerprint("openai", payload, { model: "m" });
    assert.notEqual(base, fingerprint("openai", { messages: [{ role: "user", content: "laptops under 900" }] }, { model: "m" }));
    assert.notEqual(base, fingerprint("openai", payload, { model: "n" }));
    assert.notEqual(base, fingerprint("groq", payload, { model: "m" }));
  });

  it("lays out provider, namespace and hash", () => {
    assert.match(fingerprint("openai", { q: 1 }), /^openai:_:[0-9a-f]{64}$/);
    assert.match(fingerprint("openai", { q: 1 }, {}, "product_search@1.0.0"), /^openai:product_search@1\.0\.0:[0-9a-f]{64}$/);
    const plain = fingerprint("openai", { q: 1 });
    const namespaced = fingerprint("openai", { q: 1 }, {}, "product_search@1.0.0");
    assert.equal(plain.match(HASH)?.[0], namespaced.match(HASH)?.[0]);
  });

  it("drops undefined members", () => {
    assert.equal(fingerprint("p", { a: 1, b: undefined }), fingerprint("p", { a: 1 }));
  });

  it("builds prefixes that match its own ids", () => {
    const fp = fingerprint("openai", { q: 1 }, {}, "search@2");
    assert.equal(fingerprintPrefix("openai"), "openai:");
    assert.equal(fingerprintPrefix("openai", "search@2"), "openai:search@2:");
    assert.ok(fp.startsWith(fingerprintPrefix("openai", "search@2")));
  });

  it("rejects values without a canonical form", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic["self"] = cyclic;

    assert.throws(() => fingerprint("p", cyclic), FingerprintError);
    assert.throws(() => fingerprint("p", { n: Number.NaN }), FingerprintError);
    assert.throws(() => fingerprint("p", { n: Number.POSITIVE_INFINITY }), FingerprintError);
    assert.throws(() => fingerprint("p", { f: () => 1 }), FingerprintError);
    assert.throws(() => fingerprint("p", { b: 10n }), FingerprintError);
    assert.throws(() => fingerprint("p", [1, undefined]), FingerprintError);
    assert.throws(() => fingerprint("p", { m: new Map() }), FingerprintError);
  });

  it("rejects malformed segments", () => {
    assert.throws(() => fingerprint("", {}), FingerprintError);
    assert.throws(() => fingerprint("open:ai", {}), FingerprintError);
    assert.throws(() => fingerprint("openai", {}, {}, "a:b"), FingerprintError);
  });

  it("allows a shared object that is not a cycle", () => {
    const shared = { k: "v" };
    assert.doesNotThrow(() => fingerprint("p", { a: shared, b: shared }));
  });
});

describe("canonicalJson", () => {
  it("sorts keys and collapses whitespace", () => {
    assert.equal(
      canonicalJson({ b: " x  y ", a: [1, { d: true, c: null }] }),
      '{"a":[1,{"c":null,"d":true}],"b":"x y"}'
    );
  });

  it("renders dates as ISO strings", () => {
    assert.equal(canonicalJson({ at: new Date(Date.UTC(2024, 0, 2)) }), '{"at":"2024-01-02T00:00:00.000Z"}');
  });
});
