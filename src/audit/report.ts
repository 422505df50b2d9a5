/**
 * report.ts - Plain-text audit report
 *
 * Renders an AuditSummary for the terminal. The JSON form is the summary
 * itself; this is the human-readable one.
 */

import type { AuditSummary, CountEntry } from "./auditor";

/** Rows shown per section */
const SHOWN_TECH_STACKS = 8;
const SHOWN_CANDIDATES = 5;
const SHOWN_SHARED_TECH = 3;

function grade(value: number, levels: [number, string][], fallback: string): string {
  return levels.find(([minimum]) => value >= minimum)?.[1] ?? fallback;
}

function countRow([name, count]: CountEntry): string {
  return `  ${name.padEnd(20)} ${String(count).padStart(3)} agents`;
}

export function formatAuditReport(summary: AuditSummary): string {
  const { coverage, candidates } = summary;
  const lines: string[] = [
    `Agent audit of "${summary.collection}"`,
    "",
    "Summary",
    `  Total agents:             ${coverage.totalAgents}`,
    `  Categories represented:   ${coverage.categoryBalance.spread}`,
    `  Unique tech stacks:       ${coverage.uniqueTechStacks}`,
    `  Consolidation candidates: ${candidates.length}`,
    `  Coverage gaps:            ${coverage.coverageGaps.length}`,
    `  Health score:             ${summary.healthScore}`,
    "",
    "Category distribution",
  ];

  if (coverage.categories.length === 0) lines.push("  None.");
  for (const entry of coverage.categories) {
    const percent = (entry[1] / coverage.totalAgents) * 100;
    const bar = "#".repeat(Math.floor(percent / 5));
    lines.push(`${countRow(entry)} ${percent.toFixed(1).padStart(5)}% ${bar}`.trimEnd());
  }

  lines.push("", "Top tech stacks");
  if (coverage.topTechStacks.length === 0) lines.push("  None.");
  for (const entry of coverage.topTechStacks.slice(0, SHOWN_TECH_STACKS)) {
    lines.push(countRow(entry));
  }

  lines.push("", "Coverage gaps (fewer than 2 agents)");
  if (coverage.coverageGaps.length === 0) lines.push("  None.");
  for (const tech of coverage.coverageGaps) lines.push(`  - ${tech}`);

  lines.push("", "Consolidation candidates");
  if (candidates.length === 0) lines.push("  None.");
  candidates.slice(0, SHOWN_CANDIDATES).forEach((candidate, i) => {
    lines.push(
      `  ${i + 1}. ${candidate.first.path} <-> ${candidate.second.path}`,
      `     Overlap: ${Math.round(candidate.overlap * 100)}% | ` +
        `Shared: ${candidate.sharedTech.slice(0, SHOWN_SHARED_TECH).join(", ")}`
    );
  });

  const health = candidates.length < 5 ? "good" : candidates.length < 10 ? "fair" : "review";
  lines.push(
    "",
    "Assessment",
    `  Portfolio health: ${health}`,
    `  Specialization:   ${grade(coverage.categoryBalance.spread, [[8, "diverse"], [5, "moderate"]], "limited")}`,
    `  Tech coverage:    ${grade(coverage.topTechStacks.length, [[10, "comprehensive"], [5, "good"]], "narrow")}`
  );

  return lines.join("\n");
}
