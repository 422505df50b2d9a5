/**
 * auditor.ts - Coverage and overlap analysis of an agent collection
 *
 * An agent collection holds chunks; the audit works on agents. Chunks are
 * grouped back into one profile per source document, then:
 *
 * - analyzeCoverage() counts agents per category and per tech keyword and
 *   lists tech keywords that only one agent covers
 * - findConsolidationCandidates() pairs agents of the same category whose
 *   tech stacks overlap enough that merging them is worth a look
 *
 * Everything except loadAgentProfiles() is pure, so the analysis can be
 * tested on hand-built profiles.
 */

import path from "node:path";
import { traceOperation } from "../tracing/spans";
import { normalizeList } from "../pipeline";
import type { MetadataMap, VectorDocument, VectorStore } from "../vectorstore";

/** A tech keyword covered by fewer agents than this is a gap */
const GAP_THRESHOLD = 2;
const TOP_CATEGORIES = 10;
const TOP_TECH_STACKS = 15;
const MAX_GAPS = 10;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;
export const DEFAULT_MAX_CANDIDATES = 10;
/** Most chunks read from a collection */
export const DEFAULT_CHUNK_LIMIT = 100_000;
const PAGE_SIZE = 1000;

/**
 * One agent, aggregated from its chunks.
 */
export interface AgentProfile {
  name: string;
  /** Source document path */
  path: string;
  /** "unknown" when the chunks carry no category */
  category: string;
  /** Union over all chunks, first occurrence order */
  techStack: string[];
  description: string;
  complexity: string;
  chunkCount: number;
}

/** A name and how many agents have it, most common first */
export type CountEntry = [name: string, count: number];

export interface CoverageAnalysis {
  totalAgents: number;
  categories: CountEntry[];
  topTechStacks: CountEntry[];
  uniqueTechStacks: number;
  /** Tech keywords covered by fewer than two agents */
  coverageGaps: string[];
  categoryBalance: {
    mostCommon: CountEntry | null;
    leastCommon: CountEntry | null;
    /** Number of distinct categories */
    spread: number;
  };
}

export interface ConsolidationCandidate {
  first: AgentProfile;
  second: AgentProfile;
  category: string;
  /** Shared keywords over the larger of the two stacks, 0–1 */
  overlap: number;
  sharedTech: string[];
  recommendation: string;
}

export interface ConsolidationOptions {
  /** Minimum overlap, 0–1 (default 0.7) */
  similarityThreshold?: number;
  /** Default 10 */
  maxCandidates?: number;
}

export interface AuditOptions extends ConsolidationOptions {
  collection: string;
  vectorStore: VectorStore;
  /** Most chunks to read (default 100000) */
  limit?: number;
}

export interface AuditSummary {
  collection: string;
  agentCount: number;
  coverage: CoverageAnalysis;
  candidates: ConsolidationCandidate[];
  /** 100 minus 10 per consolidation candidate, floored at 0 */
  healthScore: number;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function stringValue(metadata: MetadataMap, key: string): string {
  const value = metadata[key];
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Groups chunks into agent profiles, keyed by metadata.source (or the chunk
 * id without its ":<index>" suffix).
 */
export function profilesFromChunks(chunks: VectorDocument[]): AgentProfile[] {
  const profiles = new Map<string, AgentProfile>();

  for (const chunk of chunks) {
    const { metadata } = chunk;
    const key = stringValue(metadata, "source") || chunk.id.replace(/:\d+$/, "");
    const techStack = normalizeList(stringValue(metadata, "techStack").split(","));

    const existing = profiles.get(key);
    if (existing) {
      existing.chunkCount += 1;
      existing.techStack = normalizeList([...existing.techStack, ...techStack]);
      continue;
    }

    profiles.set(key, {
      name:
        stringValue(metadata, "agentName") ||
        stringValue(metadata, "filename") ||
        path.basename(key),
      path: key,
      category: stringValue(metadata, "category").toLowerCase() || "unknown",
      techStack,
      description: stringValue(metadata, "description"),
      complexity: stringValue(metadata, "complexity") || "unknown",
      chunkCount: 1,
    });
  }
  return [...profiles.values()];
}

/**
 * Reads up to `limit` chunks page by page and aggregates them.
 */
export async function loadAgentProfiles(
  vectorStore: VectorStore,
  collection: string,
  limit = DEFAULT_CHUNK_LIMIT
): Promise<AgentProfile[]> {
  const chunks: VectorDocument[] = [];
  while (chunks.length < limit) {
    const pageSize = Math.min(PAGE_SIZE, limit - chunks.length);
    const page = await vectorStore.get(collection, { limit: pageSize, offset: chunks.length });
    chunks.push(...page);
    if (page.length < pageSize) break;
  }
  return profilesFromChunks(chunks);
}

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

/**
 * Counts occurrences, most common first; ties keep first-seen order.
 */
function countBy(values: string[]): CountEntry[] {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  // Array.prototype.sort is stable
  return [...counts].sort((a, b) => b[1] - a[1]);
}

export function analyzeCoverage(profiles: AgentProfile[]): CoverageAnalysis {
  const categories = countBy(profiles.map((profile) => profile.category));
  const techCounts = countBy(profiles.flatMap((profile) => profile.techStack));

  // The sort is stable, so gaps come out in first-seen order
  const coverageGaps = techCounts
    .filter(([, count]) => count < GAP_THRESHOLD)
    .map(([tech]) => tech)
    .slice(0, MAX_GAPS);

  return {
    totalAgents: profiles.length,
    categories: categories.slice(0, TOP_CATEGORIES),
    topTechStacks: techCounts.slice(0, TOP_TECH_STACKS),
    uniqueTechStacks: techCounts.length,
    coverageGaps,
    categoryBalance: {
      mostCommon: categories[0] ?? null,
      leastCommon: categories[categories.length - 1] ?? null,
      spread: categories.length,
    },
  };
}

function validateConsolidationOptions(options: ConsolidationOptions) {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new RangeError(`similarityThreshold must be between 0 and 1, got ${threshold}`);
  }
  if (!Number.isInteger(maxCandidates) || maxCandidates < 1) {
    throw new RangeError(`maxCandidates must be a positive integer, got ${maxCandidates}`);
  }
  return { threshold, maxCandidates };
}

/**
 * Pairs of same-category agents whose tech stacks overlap by at least the
 * threshold, highest overlap first.
 *
 * Overlap is |shared| / max(|a|, |b|). Agents without a tech stack are
 * never paired. A near-total overlap between two agents of the same name is
 * treated as the same agent ingested twice and skipped.
 *
 * @throws RangeError for a threshold outside [0, 1] or a non-positive
 *   candidate count
 */
export function findConsolidationCandidates(
  profiles: AgentProfile[],
  options: ConsolidationOptions = {}
): ConsolidationCandidate[] {
  const { threshold, maxCandidates } = validateConsolidationOptions(options);

  const byCategory = new Map<string, AgentProfile[]>();
  for (const profile of profiles) {
    const group = byCategory.get(profile.category) ?? [];
    group.push(profile);
    byCategory.set(profile.category, group);
  }

  const candidates: ConsolidationCandidate[] = [];
  for (const [category, group] of byCategory) {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        const first = group[i];
        const second = group[j];
        if (first.techStack.length === 0 || second.techStack.length === 0) continue;

        const other = new Set(second.techStack);
        const sharedTech = first.techStack.filter((tech) => other.has(tech));
        const overlap =
          sharedTech.length / Math.max(first.techStack.length, second.techStack.length);

        if (overlap >= 0.99 && first.name === second.name) continue;
        if (overlap < threshold) continue;

        candidates.push({
          first,
          second,
          category,
          overlap,
          sharedTech,
          recommendation:
            `Consider merging ${first.name} and ${second.name} ` +
            `(share ${Math.round(overlap * 100)}% tech stack in ${category})`,
        });
      }
    }
  }

  // Array.prototype.sort is stable
  candidates.sort((a, b) => b.overlap - a.overlap);
  return candidates.slice(0, maxCandidates);
}

/**
 * Loads a collection's agents and runs both analyses.
 *
 * @throws RangeError for invalid consolidation options, synchronously
 */
export function auditAgents(options: AuditOptions): Promise<AuditSummary> {
  validateConsolidationOptions(options);
  const { collection, vectorStore } = options;
  return traceOperation(`audit ${collection}`, { "audit.collection": collection }, async (span) => {
    const profiles = await loadAgentProfiles(vectorStore, collection, options.limit);
    const coverage = analyzeCoverage(profiles);
    const candidates = findConsolidationCandidates(profiles, options);

    span.setAttributes({
      "audit.agents": profiles.length,
      "audit.candidates": candidates.length,
    });
    return {
      collection,
      agentCount: profiles.length,
      coverage,
      candidates,
      healthScore: Math.max(0, 100 - candidates.length * 10),
    };
  });
}
