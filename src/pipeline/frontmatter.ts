/**
 * frontmatter.ts - Structured fields for agent-definition documents
 *
 * What this file does:
 * Agent documents (*.agent.md, *.prompt.md) usually start with a YAML header:
 *
 *   ---
 *   name: api-reviewer
 *   description: Reviews REST handlers for consistency
 *   model: sonnet
 *   tools: [Read, Grep]
 *   ---
 *   # API Reviewer
 *   ...
 *
 * We parse that header with js-yaml and derive the attributes stored as chunk
 * metadata: category, complexity, tech stack, languages, plus the header's own
 * name, description, model and tools.
 *
 * Header values win. Whatever the header leaves out is inferred from the
 * filename and body using the keyword tables in data/agent-keywords.json.
 *
 * A malformed header never stops ingestion: the whole original text becomes
 * the body, every attribute is left empty, and a warning is reported.
 */

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { errorMessage } from "../errors";
import type { AgentAttributes, Complexity } from "./types";

// ---------------------------------------------------------------------------
// Header parsing
// ---------------------------------------------------------------------------

/**
 * Result of parsing a document's frontmatter.
 *
 * A document without a header is a success with an empty header.
 */
export type FrontmatterResult =
  | { ok: true; header: Record<string, unknown>; body: string }
  | { ok: false; reason: string; body: string };

/** Opening "---" line, optional YAML, closing "---" line */
const HEADER_PATTERN = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Splits a YAML header from the document body.
 */
export function parseFrontmatter(text: string): FrontmatterResult {
  if (!/^---[ \t]*\r?\n/.test(text)) {
    return { ok: true, header: {}, body: text };
  }

  const match = HEADER_PATTERN.exec(text);
  if (!match) {
    return { ok: false, reason: "header is not closed by a --- line", body: text };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(match[1] ?? "");
  } catch (error) {
    const reason =
      error instanceof yaml.YAMLException ? error.message : errorMessage(error);
    return { ok: false, reason: `invalid YAML: ${reason}`, body: text };
  }

  // An empty header loads as undefined
  if (parsed === undefined || parsed === null) {
    return { ok: true, header: {}, body: text.slice(match[0].length) };
  }
  if (!isRecord(parsed)) {
    return { ok: false, reason: "header is not a key/value mapping", body: text };
  }
  return { ok: true, header: parsed, body: text.slice(match[0].length) };
}

// ---------------------------------------------------------------------------
// Keyword tables
// ---------------------------------------------------------------------------

const KeywordTableSchema = z.record(z.array(z.string().min(1)));

const KeywordTablesSchema = z.object({
  categoryKeywords: KeywordTableSchema,
  techKeywords: KeywordTableSchema,
  languageKeywords: KeywordTableSchema,
});

export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

const KEYWORDS_PATH = path.join(__dirname, "../../data/agent-keywords.json");

let cachedTables: KeywordTables | null = null;

/**
 * Loads and validates data/agent-keywords.json (once per process).
 */
export function loadKeywordTables(): KeywordTables {
  if (!cachedTables) {
    const raw: unknown = JSON.parse(fs.readFileSync(KEYWORDS_PATH, "utf-8"));
    cachedTables = KeywordTablesSchema.parse(raw);
  }
  return cachedTables;
}

// ---------------------------------------------------------------------------
// Inference helpers
// ---------------------------------------------------------------------------

const COMPLEXITIES: readonly Complexity[] = ["low", "medium", "high"];

/** Category used when no keyword matches */
export const FALLBACK_CATEGORY = "general";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * Position of the first whole-word occurrence of a keyword, or -1.
 * "ai" matches "an ai agent" but not "detail".
 */
function findKeyword(lowerText: string, keyword: string): number {
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}(?![a-z0-9])`);
  return lowerText.search(pattern);
}

/**
 * Trims, lower-cases and deduplicates, keeping first occurrences in order.
 */
export function normalizeList(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const normalized = value.trim().toLowerCase();
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      result.push(normalized);
    }
  }
  return result;
}

/**
 * The winning category and how many of its keywords matched.
 */
export interface CategoryMatch {
  category: string;
  /** Distinct keywords of the category found in the text (0 for the fallback) */
  matched: number;
  /** Keywords the category has in the table (0 for the fallback) */
  keywords: number;
}

/**
 * Picks the category whose keywords appear most often (distinct keywords).
 * Ties go to the category listed first in the table.
 */
export function matchCategory(
  filename: string,
  body: string,
  tables: KeywordTables = loadKeywordTables()
): CategoryMatch {
  const text = `${filename} ${body}`.toLowerCase();
  let best: CategoryMatch = { category: FALLBACK_CATEGORY, matched: 0, keywords: 0 };

  for (const [category, keywords] of Object.entries(tables.categoryKeywords)) {
    const matched = keywords.filter((keyword) => findKeyword(text, keyword) !== -1).length;
    if (matched > best.matched) {
      best = { category, matched, keywords: keywords.length };
    }
  }
  return best;
}

export function classifyCategory(
  filename: string,
  body: string,
  tables: KeywordTables = loadKeywordTables()
): string {
  return matchCategory(filename, body, tables).category;
}

/**
 * Keywords (tech) or table keys (languages) found in the text, ordered by
 * where they first appear.
 */
function detectTerms(
  text: string,
  table: Record<string, string[]>,
  report: "keyword" | "key"
): string[] {
  const lowerText = text.toLowerCase();
  const found: { term: string; position: number }[] = [];

  for (const [key, keywords] of Object.entries(table)) {
    const positions = keywords
      .map((keyword) => ({ keyword, position: findKeyword(lowerText, keyword) }))
      .filter((hit) => hit.position !== -1);

    if (report === "key") {
      if (positions.length > 0) {
        found.push({ term: key, position: Math.min(...positions.map((hit) => hit.position)) });
      }
    } else {
      for (const hit of positions) found.push({ term: hit.keyword, position: hit.position });
    }
  }

  // Array.prototype.sort is stable, so equal positions keep table order
  found.sort((a, b) => a.position - b.position);
  return normalizeList(found.map((hit) => hit.term));
}

export function detectTechStack(
  text: string,
  tables: KeywordTables = loadKeywordTables()
): string[] {
  return detectTerms(text, tables.techKeywords, "keyword");
}

export function detectLanguages(
  text: string,
  tables: KeywordTables = loadKeywordTables()
): string[] {
  return detectTerms(text, tables.languageKeywords, "key");
}

/**
 * Rough size class of an agent: long prompts or many tools mean "high",
 * short prompts with few tools mean "low".
 */
export function inferComplexity(body: string, toolCount: number): Complexity {
  if (body.length > 8000 || toolCount >= 8) return "high";
  if (body.length < 2000 && toolCount <= 2) return "low";
  return "medium";
}

function stringField(header: Record<string, unknown>, ...keys: string[]): string {
  for (const key of keys) {
    const value = header[key];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number" || typeof value === "boolean") return String(value);
  }
  return "";
}

/**
 * Reads a list field written either as a YAML list or a comma-separated string.
 */
function listField(header: Record<string, unknown>, ...keys: string[]): string[] {
  for (const key of keys) {
    const value = header[key];
    if (Array.isArray(value)) {
      return value.filter((item): item is string => typeof item === "string");
    }
    if (typeof value === "string" && value.trim()) return value.split(",");
  }
  return [];
}

/**
 * Agent name from the filename: "api-reviewer.agent.md" → "api-reviewer".
 */
export function agentNameFromPath(documentPath: string): string {
  return path.basename(documentPath).replace(/(\.agent|\.prompt)?\.md$/i, "");
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/** Attributes of a document whose header could not be parsed */
export const EMPTY_AGENT_ATTRIBUTES: AgentAttributes = {
  agentName: "",
  description: "",
  model: "",
  category: "",
  complexity: "",
  techStack: [],
  languages: [],
  tools: [],
};

export interface AgentExtraction {
  attributes: AgentAttributes;
  /** Text to chunk: the body after the header, or the full text on failure */
  body: string;
  headerParsed: boolean;
}

export interface ExtractOptions {
  /** Called once per malformed header. Defaults to console.warn */
  onWarning?: (message: string) => void;
  tables?: KeywordTables;
}

/**
 * Derives agent attributes from a document's header and content.
 */
export function extractAgentAttributes(
  documentPath: string,
  text: string,
  options: ExtractOptions = {}
): AgentExtraction {
  const onWarning = options.onWarning ?? console.warn;
  const parsed = parseFrontmatter(text);

  if (!parsed.ok) {
    onWarning(`Malformed frontmatter in ${documentPath}: ${parsed.reason}`);
    return {
      attributes: { ...EMPTY_AGENT_ATTRIBUTES, techStack: [], languages: [], tools: [] },
      body: parsed.body,
      headerParsed: false,
    };
  }

  const { header, body } = parsed;
  const tables = options.tables ?? loadKeywordTables();
  const filename = path.basename(documentPath);
  const tools = normalizeList(listField(header, "tools"));

  const headerComplexity = stringField(header, "complexity").toLowerCase();
  const complexity = COMPLEXITIES.find((level) => level === headerComplexity);

  const headerTech = normalizeList(listField(header, "techStack", "tech_stack"));
  const headerLanguages = normalizeList(listField(header, "languages"));

  return {
    attributes: {
      agentName: stringField(header, "name") || agentNameFromPath(documentPath),
      description: stringField(header, "description"),
      model: stringField(header, "model"),
      category:
        stringField(header, "category").toLowerCase() ||
        classifyCategory(filename, body, tables),
      complexity: complexity ?? inferComplexity(body, tools.length),
      techStack: headerTech.length > 0 ? headerTech : detectTechStack(body, tables),
      languages: headerLanguages.length > 0 ? headerLanguages : detectLanguages(body, tables),
      tools,
    },
    body,
    headerParsed: true,
  };
}
