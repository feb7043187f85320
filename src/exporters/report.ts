/**
 * Markdown report built from a finished registry.
 */

import type { CrossrefReport } from "../contracts/crossref.js";
import { formatIssue, type ValidationIssue } from "../contracts/issues.js";
import type { Entity, Relation, RegistryDict } from "../registry/schema.js";

export interface ReportInput {
  registry: RegistryDict;
  runId: string;
  generatedAt: Date;
  crossref?: CrossrefReport;
  /** Non-ASCII findings from the text audit */
  textIssues?: readonly ValidationIssue[];
}

interface ReportSection {
  title: string;
  lines: string[];
}

function renderSection(section: ReportSection): string {
  return `## ${section.title}\n\n${section.lines.join("\n")}\n`;
}

function renderEntities(entities: readonly Entity[]): string[] {
  const lines = entities.map((entity) => {
    const line = `- **${entity.entity_id}** (${entity.entity_type}) ${entity.entity_name}`;
    return entity.domain ? `${line} - ${entity.domain}` : line;
  });
  return lines.length > 0 ? lines : ["- n/v"];
}

function compareRelations(a: Relation, b: Relation): number {
  const left = [a.source_id, a.relation_type, a.target_id];
  const right = [b.source_id, b.relation_type, b.target_id];
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return 0;
}

function renderRelations(relations: readonly Relation[]): string[] {
  const lines = [...relations]
    .sort(compareRelations)
    .map((r) => `- ${r.source_id || "(unresolved)"} -> ${r.relation_type} -> ${r.target_id || "(unresolved)"}`);
  return lines.length > 0 ? lines : ["- n/v"];
}

function renderDataQuality(input: ReportInput): string[] {
  const issues = [
    ...(input.crossref?.errors ?? []),
    ...(input.crossref?.warnings ?? []),
    ...(input.textIssues ?? []),
  ];
  const lines = issues.map((issue) => `- ${formatIssue(issue)}`);
  const orphans = input.crossref?.orphaned_entity_ids ?? [];
  if (orphans.length > 0) {
    lines.push(`- Entities without relations: ${orphans.join(", ")}`);
  }
  return lines.length > 0 ? lines : ["- No issues found"];
}

/** `YYYY-MM-DD HH:MM:SSZ` */
function formatGeneratedAt(date: Date): string {
  return date.toISOString().replace("T", " ").replace(/\.\d{3}Z$/, "Z");
}

export function buildReportMarkdown(input: ReportInput): string {
  const entities = [...input.registry.entities].sort((a, b) =>
    a.entity_id < b.entity_id ? -1 : a.entity_id > b.entity_id ? 1 : 0
  );
  const relations = input.registry.relations;

  const sections: ReportSection[] = [
    {
      title: "Run Summary",
      lines: [
        `- Run ID: ${input.runId}`,
        `- Generated at (UTC): ${formatGeneratedAt(input.generatedAt)}`,
        `- Entity count: ${entities.length}`,
        `- Relation count: ${relations.length}`,
      ],
    },
    { title: "Entities", lines: renderEntities(entities) },
    { title: "Relations", lines: renderRelations(relations) },
    { title: "Data Quality", lines: renderDataQuality(input) },
  ];

  return `# Market Intelligence Report\n\n${sections.map(renderSection).join("\n")}`;
}
