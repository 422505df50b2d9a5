/**
 * agent-query.ts - "Which agent should handle this?" lookups
 *
 * Searches an agent collection with one result per agent document and turns
 * each hit into a match with a 0–1 confidence (1 minus distance). Matches
 * beyond the distance threshold are dropped, unless that would drop all of
 * them: then every hit is returned and withinThreshold is false, so the
 * caller still sees the closest agents.
 */

import { InvalidQueryError } from "../errors";
import { AGENTS_COLLECTION } from "../vectorstore";
import { DEFAULT_LIMIT } from "./query";
import type { Retriever } from "./retriever";

/** Distance at the top of the "good" calibration band */
export const DEFAULT_AGENT_THRESHOLD = 1.0;

const PREVIEW_LENGTH = 100;

export interface AgentMatch {
  agentName: string;
  source: string;
  /** max(0, 1 - distance) */
  confidence: number;
  distance: number;
  preview: string;
}

export interface AgentQueryResult {
  query: string;
  collection: string;
  threshold: number;
  resultsCount: number;
  matches: AgentMatch[];
  /** False when no hit was within the threshold and all hits are returned */
  withinThreshold: boolean;
}

export interface AgentQueryOptions {
  collection?: string;
  limit?: number;
  threshold?: number;
}

function metadataString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * @throws InvalidQueryError for empty text, a bad limit or a negative threshold
 */
export async function queryAgents(
  retriever: Retriever,
  text: string,
  options: AgentQueryOptions = {}
): Promise<AgentQueryResult> {
  const collection = options.collection ?? AGENTS_COLLECTION;
  const threshold = options.threshold ?? DEFAULT_AGENT_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new InvalidQueryError(`Threshold must be a non-negative number, got ${threshold}`);
  }

  const results = await retriever.search(text, collection, {
    limit: options.limit ?? DEFAULT_LIMIT,
    dedupe: true,
  });
  const close = results.filter((result) => result.distance <= threshold);
  const withinThreshold = close.length > 0 || results.length === 0;
  const kept = close.length > 0 ? close : results;

  const matches = kept.map((result): AgentMatch => {
    const { metadata } = result;
    return {
      agentName:
        metadataString(metadata.agentName) || metadataString(metadata.filename) || "unknown",
      source: metadataString(metadata.source) || result.id,
      confidence: Math.max(0, 1 - result.distance),
      distance: result.distance,
      preview: result.text.slice(0, PREVIEW_LENGTH).trim(),
    };
  });

  return {
    query: text,
    collection,
    threshold,
    resultsCount: matches.length,
    matches,
    withinThreshold,
  };
}

export function formatAgentMatches(result: AgentQueryResult): string {
  if (result.matches.length === 0) return "No agents found matching your query.";

  const lines = [`Found ${result.matches.length} matching agent(s):`];
  result.matches.forEach((match, i) => {
    lines.push(
      "",
      `${i + 1}. ${match.agentName}`,
      `   Source: ${match.source}`,
      `   Confidence: ${(match.confidence * 100).toFixed(1)}%`,
      `   Preview: ${match.preview}`
    );
  });
  if (!result.withinThreshold) {
    lines.push(
      "",
      `Note: no agent was within distance ${result.threshold}; showing the closest matches.`
    );
  }
  return lines.join("\n");
}
