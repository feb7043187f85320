/**
 * Deduplicator tests.
 *
 * Run with: node --import tsx --test src/registry/deduper.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { dedupeEntities, resolveEntityKey } from "./deduper.js";
import type { EntityPayload } from "./schema.js";

describe("resolveEntityKey", () => {
  test("reuses an explicit key", () => {
    assert.equal(
      resolveEntityKey({ entity_key: "domain:acme.com", domain: "other.example" }),
      "domain:acme.com"
    );
  });

  test("rebuilds a placeholder key from domain or name", () => {
    assert.equal(
      resolveEntityKey({ entity_key: "n/v", domain: "https://Beta.example/about" }),
      "domain:beta.example"
    );
    assert.equal(resolveEntityKey({ entity_name: "Gamma  KG" }), "name:gamma kg");
  });
});

describe("dedupeEntities", () => {
  test("keeps the first payload for a shared key", () => {
    const result = dedupeEntities([
      { entity_type: "manufacturer", entity_name: "Beta One", domain: "beta.example" },
      { entity_type: "manufacturer", entity_name: "Beta Two", domain: "https://beta.example/" },
    ]);
    assert.equal(result.length, 1);
    assert.equal(result[0]?.entity_name, "Beta One");
    assert.equal(result[0]?.entity_key, "domain:beta.example");
  });

  test("preserves input order of distinct entities", () => {
    const result = dedupeEntities([
      { entity_name: "Zeta" },
      { entity_name: "Alpha" },
      { entity_name: "zeta" },
    ]);
    assert.deepEqual(
      result.map((p) => p.entity_key),
      ["name:zeta", "name:alpha"]
    );
  });

  test("never collapses payloads without identity", () => {
    const result = dedupeEntities([
      { entity_type: "customer" },
      { entity_type: "customer", entity_key: "n/v" },
    ]);
    assert.equal(result.length, 2);
    assert.deepEqual(
      result.map((p) => p.entity_key),
      ["n/v", "n/v"]
    );
  });

  test("does not mutate its input", () => {
    const input: EntityPayload[] = [{ entity_name: "Acme", domain: "acme.com" }];
    dedupeEntities(input);
    assert.equal(input[0]?.entity_key, undefined);
  });

  test("is idempotent", () => {
    const xs: EntityPayload[] = [
      { entity_name: "Beta", domain: "beta.example" },
      { entity_name: "Beta Copy", entity_key: "domain:beta.example" },
      { entity_name: "Gamma" },
      { entity_type: "site" },
      { entity_name: "GAMMA" },
    ];
    const once = dedupeEntities(xs);
    const twice = dedupeEntities(once);
    assert.deepEqual(twice, once);
    assert.equal(once.length, 3);
  });
});
