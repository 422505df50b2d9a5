/**
 * query.ts - Search request validation and metadata filter building
 *
 * Every check here runs before the retriever touches the vector store, so a
 * malformed request costs no embedding call and no network round-trip.
 *
 * Metadata filters are written as plain objects:
 *
 *   { category: "security" }                       → { category: "security" }
 *   { category: ["security", "backend"] }          → { category: { $in: [...] } }
 *   { category: "security", complexity: "low" }    → { $and: [{...}, {...}] }
 *
 * Chroma uses MongoDB-style query syntax. For a single condition we pass a
 * plain object; for multiple conditions we wrap them in $and.
 */

import { InvalidQueryError } from "../errors";
import type { MetadataScalar, WhereFilter } from "../vectorstore";

/** Largest limit a single search accepts */
export const MAX_LIMIT = 1000;

/** Results returned when no limit is given */
export const DEFAULT_LIMIT = 5;

/**
 * Field → value (equality) or non-empty list of values (membership).
 */
export type MetadataFilter = Record<string, MetadataScalar | MetadataScalar[]>;

/**
 * Options shared by every search operation.
 */
export interface QueryOptions {
  /** Maximum results, integer in [1, 1000] (default 5) */
  limit?: number;
  /** Drop results with distance strictly greater than this */
  distanceThreshold?: number;
  /** Restrict results by metadata before ranking */
  where?: MetadataFilter;
  /** Keep only the closest chunk per source document */
  dedupe?: boolean;
}

/**
 * A request that passed validation.
 */
export interface ValidatedQuery {
  text: string;
  limit: number;
  distanceThreshold?: number;
  where?: WhereFilter;
  dedupe: boolean;
}

function isScalar(value: unknown): value is MetadataScalar {
  return (
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

/**
 * Converts a metadata filter to Chroma's where syntax.
 *
 * @throws InvalidQueryError for an empty filter, an empty list, or a value
 *   that is not a string, finite number or boolean
 */
export function buildWhereFilter(filter: MetadataFilter): WhereFilter {
  const entries = Object.entries(filter);
  if (entries.length === 0) {
    throw new InvalidQueryError("Metadata filter must name at least one field");
  }

  const conditions: WhereFilter[] = entries.map(([field, value]) => {
    if (!field) {
      throw new InvalidQueryError("Metadata filter field names must be non-empty");
    }
    if (Array.isArray(value)) {
      if (value.length === 0) {
        throw new InvalidQueryError(`Metadata filter "${field}" has an empty value list`);
      }
      if (!value.every(isScalar)) {
        throw new InvalidQueryError(
          `Metadata filter "${field}" may only list strings, numbers or booleans`
        );
      }
      return { [field]: { $in: value } };
    }
    if (!isScalar(value)) {
      throw new InvalidQueryError(
        `Metadata filter "${field}" must be a string, number or boolean`
      );
    }
    return { [field]: value };
  });

  return conditions.length === 1 ? conditions[0] : { $and: conditions };
}

/**
 * Validates a search request.
 *
 * @throws InvalidQueryError naming the first problem found
 */
export function validateQuery(text: string, options: QueryOptions = {}): ValidatedQuery {
  if (typeof text !== "string" || text.trim().length === 0) {
    throw new InvalidQueryError("Query text must not be empty");
  }

  const limit = options.limit ?? DEFAULT_LIMIT;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    throw new InvalidQueryError(
      `limit must be an integer between 1 and ${MAX_LIMIT}, got ${limit}`
    );
  }

  const threshold = options.distanceThreshold;
  if (threshold !== undefined && !(Number.isFinite(threshold) && threshold >= 0)) {
    throw new InvalidQueryError(
      `distanceThreshold must be a non-negative number, got ${threshold}`
    );
  }

  return {
    text,
    limit,
    distanceThreshold: threshold,
    where: options.where ? buildWhereFilter(options.where) : undefined,
    dedupe: options.dedupe ?? false,
  };
}
