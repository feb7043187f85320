/**
 * Final run exports, written once the DAG has drained.
 */

import { join } from "node:path";
import { checkCrossrefIntegrity, findNonAsciiStrings, type CrossrefReport } from "../contracts/crossref.js";
import type { RegistryDict } from "../registry/schema.js";
import {
  buildManifestEntry,
  writeJsonAtomic,
  writeTextAtomic,
  type ManifestEntry,
} from "../orchestrator/artifact-store.js";
import { buildReportMarkdown } from "./report.js";

export const EXPORT_FILES = ["entities.json", "relations.json", "crossref.json", "report.md"] as const;

export interface ExportResult {
  crossref: CrossrefReport;
  files: ManifestEntry[];
}

export interface ExportOptions {
  exportsDir: string;
  /** Manifest paths are relative to this directory */
  runRoot: string;
  runId: string;
  registry: RegistryDict;
  generatedAt: Date;
}

export function writeExports(options: ExportOptions): ExportResult {
  const { exportsDir, registry } = options;
  const crossref = checkCrossrefIntegrity(registry);
  const textIssues = findNonAsciiStrings(registry, "$");

  writeJsonAtomic(join(exportsDir, "entities.json"), registry.entities);
  writeJsonAtomic(join(exportsDir, "relations.json"), registry.relations);
  writeJsonAtomic(join(exportsDir, "crossref.json"), crossref);
  writeTextAtomic(
    join(exportsDir, "report.md"),
    buildReportMarkdown({
      registry,
      runId: options.runId,
      generatedAt: options.generatedAt,
      crossref,
      textIssues,
    })
  );

  return {
    crossref,
    files: EXPORT_FILES.map((name) => buildManifestEntry(join(exportsDir, name), options.runRoot)),
  };
}
