/**
 * config.ts - Environment configuration
 *
 * What this file does:
 * Reads and validates the environment once, at startup, and hands typed
 * configuration to the components that need it. Nothing else in the project
 * reads process.env for Chroma or calibration settings.
 *
 * Why validate eagerly?
 * A malformed CHROMA_PORT should stop the process before the first ingest or
 * query, not surface later as a confusing connection failure. Zod gives us
 * one place that describes every key, its default, and its constraints.
 *
 * Keys:
 * - CHROMA_HOST (default "localhost"), CHROMA_PORT (default 9500), CHROMA_SSL
 * - VOYAGE_API_KEY, VOYAGE_MODEL: embedding model access
 * - DISTANCE_BANDS: three comma-separated calibration edges (default 0.8,1.0,1.2)
 */

import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import {
  DEFAULT_DISTANCE_BANDS,
  parseDistanceBands,
  type DistanceBands,
} from "./retrieval/calibration";

/** Default Chroma host when CHROMA_HOST is unset */
export const DEFAULT_CHROMA_HOST = "localhost";

/** Default Chroma port when CHROMA_PORT is unset */
export const DEFAULT_CHROMA_PORT = 9500;

/**
 * Connection settings for the single Chroma client.
 */
export interface StoreConfig {
  host: string;
  port: number;
  ssl: boolean;
}

/**
 * Everything the CLI and MCP server need to wire the system together.
 */
export interface AppConfig {
  store: StoreConfig;
  /** Undefined when not set; only commands that embed text require it */
  voyageApiKey?: string;
  voyageModel?: string;
  bands: DistanceBands;
}

/**
 * Treats empty strings as "unset" so `CHROMA_PORT=` behaves like no value.
 */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  CHROMA_HOST: optionalString,
  CHROMA_PORT: optionalString.pipe(
    z
      .string()
      .regex(/^\d+$/, "must be a whole number")
      .transform(Number)
      .pipe(z.number().int().min(1).max(65535))
      .optional()
  ),
  CHROMA_SSL: optionalString.pipe(z.enum(["true", "false"]).optional()),
  VOYAGE_API_KEY: optionalString,
  VOYAGE_MODEL: optionalString,
  DISTANCE_BANDS: optionalString,
});

/**
 * Parses and validates configuration from an environment map.
 *
 * @param env - Defaults to process.env; tests pass a plain object
 * @throws ConfigError naming every invalid key
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${problems}`, {
      details: { issues: parsed.error.issues },
    });
  }

  const values = parsed.data;

  let bands = DEFAULT_DISTANCE_BANDS;
  if (values.DISTANCE_BANDS) {
    try {
      bands = parseDistanceBands(values.DISTANCE_BANDS);
    } catch (error) {
      throw new ConfigError(
        `Invalid environment configuration: DISTANCE_BANDS: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  return {
    store: {
      host: values.CHROMA_HOST ?? DEFAULT_CHROMA_HOST,
      port: values.CHROMA_PORT ?? DEFAULT_CHROMA_PORT,
      ssl: values.CHROMA_SSL === "true",
    },
    voyageApiKey: values.VOYAGE_API_KEY,
    voyageModel: values.VOYAGE_MODEL,
    bands,
  };
}
