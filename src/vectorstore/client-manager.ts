/**
 * client-manager.ts - Owns the one Chroma client for the process
 *
 * What this file does:
 * Builds the ChromaClient on first use, checks it with a heartbeat, and hands
 * the same client to every caller afterwards. The CLI and MCP server create
 * one manager from the validated config and pass it to ChromaBackend, so there
 * is no module-level client and tests can give each case its own manager.
 *
 * Concurrency:
 * getClient() caches the in-flight initialization promise, not just the
 * finished client. Two searches that start before the first heartbeat returns
 * both await the same promise, so only one client is ever built.
 */

import { ChromaClient } from "chromadb";
import type { StoreConfig } from "../config";
import { ConnectionError, errorMessage } from "../errors";

/**
 * Builds a Chroma client from connection settings. Injected so tests can
 * hand back a fake without a server.
 */
export type ChromaClientFactory = (config: StoreConfig) => ChromaClient;

const defaultFactory: ChromaClientFactory = (config) =>
  new ChromaClient({ host: config.host, port: config.port, ssl: config.ssl });

export class StoreClientManager {
  private readonly config: StoreConfig;
  private readonly createClient: ChromaClientFactory;
  private pending: Promise<ChromaClient> | null = null;
  private resets = 0;

  constructor(config: StoreConfig, createClient: ChromaClientFactory = defaultFactory) {
    this.config = config;
    this.createClient = createClient;
  }

  /** "http://localhost:9500" style address, for messages */
  get address(): string {
    const scheme = this.config.ssl ? "https" : "http";
    return `${scheme}://${this.config.host}:${this.config.port}`;
  }

  /**
   * Returns the shared client, creating and verifying it on first access.
   *
   * @throws ConnectionError when the heartbeat fails; the manager stays
   *   uninitialized so a later call tries again
   */
  getClient(): Promise<ChromaClient> {
    if (!this.pending) {
      const attempt = this.connect();
      this.pending = attempt;
      // Forget a failed attempt; the caller still sees the rejection
      void attempt.catch(() => {
        if (this.pending === attempt) this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Bumped by every reset(). Anything cached from an older client (opened
   * collections) is stale once this changes.
   */
  get generation(): number {
    return this.resets;
  }

  /**
   * Drops the client so the next getClient() builds a fresh one.
   */
  reset(): void {
    this.pending = null;
    this.resets += 1;
  }

  private async connect(): Promise<ChromaClient> {
    let client: ChromaClient;
    try {
      client = this.createClient(this.config);
      await client.heartbeat();
    } catch (error) {
      throw new ConnectionError(
        `Cannot reach Chroma at ${this.address}: ${errorMessage(error)}`,
        { cause: error, details: { address: this.address } }
      );
    }
    return client;
  }
}
