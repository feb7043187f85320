/**
 * ID allocator tests.
 *
 * Run with: node --import tsx --test src/registry/id-allocator.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { IdAllocator, parseEntityId, prefixForType, type IdSource } from "./id-allocator.js";

function fakeRegistry(ids: string[]): IdSource & { ids: Set<string> } {
  const set = new Set(ids);
  return {
    ids: set,
    entityIds: () => set.values(),
    hasId: (id) => set.has(id),
  };
}

describe("IdAllocator", () => {
  test("continues after the highest existing number per prefix", () => {
    const registry = fakeRegistry(["TGT-001", "MFR-002", "MFR-005", "CUS-010"]);
    const allocator = new IdAllocator();
    assert.equal(allocator.allocate("manufacturer", registry), "MFR-006");
    assert.equal(allocator.allocate("manufacturer", registry), "MFR-007");
    assert.equal(allocator.allocate("customer", registry), "CUS-011");
    assert.equal(allocator.allocate("subsidiary", registry), "SUB-001");
  });

  test("always returns TGT-001 for the target company", () => {
    const registry = fakeRegistry(["TGT-001"]);
    const allocator = new IdAllocator();
    assert.equal(allocator.allocate("target_company", registry), "TGT-001");
    assert.equal(allocator.allocate("target_company", registry), "TGT-001");
  });

  test("maps unknown types to ENT and sites to LOC", () => {
    const registry = fakeRegistry([]);
    const allocator = new IdAllocator();
    assert.equal(allocator.allocate("distributor", registry), "ENT-001");
    assert.equal(allocator.allocate("site", registry), "LOC-001");
    assert.equal(allocator.allocate("location_site", registry), "LOC-002");
  });

  test("seeds only once per instance", () => {
    const registry = fakeRegistry(["MFR-003"]);
    const allocator = new IdAllocator();
    assert.equal(allocator.allocate("manufacturer", registry), "MFR-004");
    // IDs appearing later do not reseed, but are still skipped.
    registry.ids.add("MFR-009");
    registry.ids.add("MFR-005");
    assert.equal(allocator.allocate("manufacturer", registry), "MFR-006");
    assert.equal(allocator.peek("MFR"), 6);
  });

  test("ignores IDs with unknown prefixes while seeding", () => {
    const registry = fakeRegistry(["XYZ-050", "ENT-004"]);
    const allocator = new IdAllocator();
    assert.equal(allocator.allocate("anything", registry), "ENT-005");
    assert.equal(allocator.peek("XYZ"), 0);
  });
});

describe("helpers", () => {
  test("prefixForType", () => {
    assert.equal(prefixForType("customer"), "CUS");
    assert.equal(prefixForType("constructor"), "ENT");
  });

  test("parseEntityId", () => {
    assert.deepEqual(parseEntityId("MFR-014"), { prefix: "MFR", counter: 14 });
    assert.equal(parseEntityId("unresolved:MFR-014"), null);
  });
});
