/**
 * Crossref integrity audit tests.
 *
 * Run with: node --import tsx --test src/contracts/crossref.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { checkCrossrefIntegrity, findNonAsciiStrings } from "./crossref.js";
import { EntityRegistry } from "../registry/entity-registry.js";
import { mergeRegistry } from "../registry/merger.js";

function registryWithTarget(): EntityRegistry {
  const registry = EntityRegistry.create();
  mergeRegistry({
    registry,
    entitiesDelta: [
      { entity_id: "TGT-001", entity_type: "target_company", entity_name: "Acme GmbH", domain: "acme.com" },
    ],
    relationsDelta: [],
  });
  return registry;
}

describe("checkCrossrefIntegrity", () => {
  test("flags a relation to an entity that was never merged", () => {
    const registry = registryWithTarget();
    mergeRegistry({
      registry,
      entitiesDelta: [],
      relationsDelta: [{ source_id: "TGT-001", relation_type: "peer_of", target_id: "MFR-999" }],
    });

    const report = checkCrossrefIntegrity(registry.toDict());
    assert.equal(report.ok, false);
    assert.deepEqual(report.errors, [
      {
        code: "dangling_reference",
        message: "target_id MFR-999 is not a registered entity",
        path: "$.relations[0].target_id",
      },
    ]);
  });

  test("reports self references, prefix mismatches and orphans as non-fatal", () => {
    const registry = registryWithTarget();
    mergeRegistry({
      registry,
      entitiesDelta: [
        { entity_id: "CUS-007", entity_type: "manufacturer", entity_name: "Mislabelled", domain: "m.example" },
        { entity_type: "customer", entity_name: "Lonely", domain: "lonely.example" },
      ],
      relationsDelta: [{ source_id: "TGT-001", target_id: "TGT-001", relation_type: "peer_of" }],
    });

    const report = checkCrossrefIntegrity(registry.toDict());
    assert.equal(report.ok, true);
    assert.deepEqual(
      report.warnings.map((w) => w.code),
      ["self_reference", "id_prefix_mismatch"]
    );
    assert.deepEqual(report.orphaned_entity_ids, ["CUS-007", "CUS-008"]);
    assert.equal(report.entity_count, 3);
    assert.equal(report.relation_count, 1);
  });

  test("flags empty endpoints from unresolved keys", () => {
    const registry = registryWithTarget();
    mergeRegistry({
      registry,
      entitiesDelta: [],
      relationsDelta: [{ source_key: "domain:unknown.example", target_id: "TGT-001", relation_type: "supplies_to" }],
    });
    const report = checkCrossrefIntegrity(registry.toDict());
    assert.deepEqual(
      report.errors.map((e) => e.message),
      ["source_id is empty"]
    );
  });
});

describe("findNonAsciiStrings", () => {
  test("reports paths of non-ASCII strings", () => {
    const issues = findNonAsciiStrings({
      entities: [{ entity_name: "Müller AG", city: "Berlin" }],
      note: "plain",
    });
    assert.deepEqual(
      issues.map((i) => i.path),
      ["$.entities[0].entity_name"]
    );
  });
});
