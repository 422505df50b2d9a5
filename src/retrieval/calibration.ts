/**
 * calibration.ts - Distance quality tiers
 *
 * Chroma returns distances, not similarity scores: lower is better and there
 * is no fixed upper bound. To make a raw distance readable we map it onto
 * four advisory tiers. The tiers are labels only; they never remove a result.
 * Dropping results is the job of an explicit distanceThreshold.
 *
 * The band edges depend on the embedding model and the corpus, and have
 * drifted between measurements, so they are configuration (DISTANCE_BANDS)
 * rather than constants baked into the retriever.
 */

/**
 * Advisory quality label for a distance.
 */
export type QualityTier = "excellent" | "good" | "acceptable" | "poor";

/**
 * Ascending band edges: [excellent, good, acceptable].
 *
 * A distance below the first edge is "excellent", below the second "good",
 * up to and including the third "acceptable", and anything above is "poor".
 */
export type DistanceBands = readonly [number, number, number];

/** Current calibration for voyage embeddings with cosine distance. */
export const DEFAULT_DISTANCE_BANDS: DistanceBands = [0.8, 1.0, 1.2];

/** Earlier, tighter calibration kept for comparison runs. */
export const LEGACY_DISTANCE_BANDS: DistanceBands = [0.5, 0.7, 0.9];

/**
 * Maps a distance to its quality tier.
 */
export function classifyDistance(
  distance: number,
  bands: DistanceBands = DEFAULT_DISTANCE_BANDS
): QualityTier {
  const [excellent, good, acceptable] = bands;
  if (distance < excellent) return "excellent";
  if (distance < good) return "good";
  if (distance <= acceptable) return "acceptable";
  return "poor";
}

/**
 * Parses "0.8,1.0,1.2" into validated band edges.
 *
 * @throws Error when there are not exactly three non-negative, strictly
 *   ascending numbers
 */
export function parseDistanceBands(raw: string): DistanceBands {
  const parts = raw.split(",").map((part) => part.trim());
  if (parts.length !== 3 || parts.some((part) => part === "")) {
    throw new Error(`expected three comma-separated numbers, got "${raw}"`);
  }

  const [first, second, third] = parts.map(Number);
  const bands: DistanceBands = [first, second, third];
  return validateDistanceBands(bands);
}

/**
 * Checks that band edges are finite, non-negative and strictly ascending.
 */
export function validateDistanceBands(bands: DistanceBands): DistanceBands {
  if (!bands.every((edge) => Number.isFinite(edge) && edge >= 0)) {
    throw new Error(`band edges must be non-negative numbers, got ${bands.join(",")}`);
  }
  if (!(bands[0] < bands[1] && bands[1] < bands[2])) {
    throw new Error(`band edges must be strictly ascending, got ${bands.join(",")}`);
  }
  return bands;
}
