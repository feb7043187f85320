/**
 * Entity registry tests.
 *
 * Run with: node --import tsx --test src/registry/entity-registry.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { EntityRegistry, RegistryError } from "./entity-registry.js";
import { IdAllocator } from "./id-allocator.js";
import type { Entity } from "./schema.js";

function entity(overrides: Partial<Entity> & Pick<Entity, "entity_id" | "entity_key">): Entity {
  return {
    entity_type: "manufacturer",
    entity_name: "Example",
    domain: null,
    attributes: {},
    sources: [],
    ...overrides,
  };
}

describe("EntityRegistry", () => {
  test("indexes entities by ID and key", () => {
    const registry = EntityRegistry.create();
    registry.addEntity(entity({ entity_id: "MFR-001", entity_key: "domain:beta.example" }));
    assert.equal(registry.entityCount, 1);
    assert.equal(registry.idForKey("domain:beta.example"), "MFR-001");
    assert.equal(registry.getByKey("domain:beta.example")?.entity_id, "MFR-001");
    assert.equal(registry.hasId("MFR-001"), true);
  });

  test("rejects duplicate IDs and keys", () => {
    const registry = EntityRegistry.create();
    registry.addEntity(entity({ entity_id: "MFR-001", entity_key: "domain:a.example" }));
    assert.throws(
      () => registry.addEntity(entity({ entity_id: "MFR-001", entity_key: "domain:b.example" })),
      RegistryError
    );
    assert.throws(
      () => registry.addEntity(entity({ entity_id: "MFR-002", entity_key: "domain:a.example" })),
      RegistryError
    );
  });

  test("readers receive copies", () => {
    const registry = EntityRegistry.create();
    registry.addEntity(entity({ entity_id: "MFR-001", entity_key: "domain:a.example" }));
    const copy = registry.getById("MFR-001");
    assert.ok(copy);
    copy.attributes["tampered"] = true;
    assert.deepEqual(registry.getById("MFR-001")?.attributes, {});
  });

  test("updateEntity merges attributes shallowly and appends sources", () => {
    const registry = EntityRegistry.create();
    registry.addEntity(
      entity({
        entity_id: "TGT-001",
        entity_key: "domain:acme.com",
        attributes: { a: 1, nested: { x: 1 } },
        sources: [{ publisher: "seed" }],
      })
    );
    registry.updateEntity("TGT-001", { b: 2, nested: { y: 2 } }, [{ publisher: "update" }]);
    const updated = registry.getById("TGT-001");
    assert.deepEqual(updated?.attributes, { a: 1, b: 2, nested: { y: 2 } });
    assert.deepEqual(updated?.sources, [{ publisher: "seed" }, { publisher: "update" }]);
    assert.throws(() => registry.updateEntity("MFR-404", {}, []), RegistryError);
  });

  test("toDict sorts entities by ID and keeps relation order", () => {
    const registry = EntityRegistry.create();
    registry.addEntity(entity({ entity_id: "MFR-002", entity_key: "name:b" }));
    registry.addEntity(entity({ entity_id: "CUS-001", entity_key: "name:c" }));
    registry.addEntity(entity({ entity_id: "MFR-001", entity_key: "name:a" }));
    registry.addRelation({ source_id: "MFR-002", target_id: "CUS-001", relation_type: "supplies_to", evidence: [] });
    registry.addRelation({ source_id: "MFR-001", target_id: "CUS-001", relation_type: "supplies_to", evidence: [] });

    const dict = registry.toDict();
    assert.deepEqual(
      dict.entities.map((e) => e.entity_id),
      ["CUS-001", "MFR-001", "MFR-002"]
    );
    assert.deepEqual(
      dict.relations.map((r) => r.source_id),
      ["MFR-002", "MFR-001"]
    );
  });

  test("fromDict restores a registry an allocator can resume from", () => {
    const original = EntityRegistry.create();
    original.addEntity(entity({ entity_id: "MFR-005", entity_key: "domain:m.example" }));
    original.addRelation({ source_id: "MFR-005", target_id: "TGT-001", relation_type: "peer_of", evidence: [] });

    const restored = EntityRegistry.fromDict(JSON.parse(JSON.stringify(original.toDict())));
    assert.deepEqual(restored.toDict(), original.toDict());
    assert.equal(new IdAllocator().allocate("manufacturer", restored), "MFR-006");
  });

  test("fromDict rejects malformed snapshots", () => {
    assert.throws(
      () => EntityRegistry.fromDict({ entities: [{ entity_id: "MFR-001" }], relations: [] }),
      RegistryError
    );
  });
});
