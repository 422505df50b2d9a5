/**
 * client-manager.test.ts - Unit tests for the shared Chroma client
 *
 * The client factory is injected, so no server is needed: the "client" is
 * an object with a heartbeat we control.
 */

import { describe, it, expect, vi } from "vitest";
import { ConnectionError } from "../errors";
import { StoreClientManager } from "./client-manager";

const config = { host: "localhost", port: 9500, ssl: false };

function fakeClient() {
  return { heartbeat: vi.fn().mockResolvedValue(1) };
}

describe("StoreClientManager", () => {
  it("builds the client once and reuses it", async () => {
    const client = fakeClient();
    const factory = vi.fn().mockReturnValue(client);
    const manager = new StoreClientManager(config, factory);

    const first = await manager.getClient();
    const second = await manager.getClient();

    expect(first).toBe(client);
    expect(second).toBe(client);
    expect(factory).toHaveBeenCalledOnce();
    expect(factory).toHaveBeenCalledWith(config);
    expect(client.heartbeat).toHaveBeenCalledOnce();
  });

  it("shares one initialization between concurrent callers", async () => {
    const factory = vi.fn().mockReturnValue(fakeClient());
    const manager = new StoreClientManager(config, factory);

    const [a, b, c] = await Promise.all([
      manager.getClient(),
      manager.getClient(),
      manager.getClient(),
    ]);

    expect(factory).toHaveBeenCalledOnce();
    expect(a).toBe(b);
    expect(b).toBe(c);
  });

  it("rejects with ConnectionError when the heartbeat fails", async () => {
    const client = fakeClient();
    client.heartbeat.mockRejectedValueOnce(new TypeError("fetch failed"));
    const manager = new StoreClientManager(config, vi.fn().mockReturnValue(client));

    const attempt = manager.getClient();

    await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
    await expect(attempt).rejects.toThrow(
      "Cannot reach Chroma at http://localhost:9500: fetch failed"
    );
  });

  it("tries again after a failed first access", async () => {
    const client = fakeClient();
    client.heartbeat.mockRejectedValueOnce(new Error("ECONNREFUSED"));
    const factory = vi.fn().mockReturnValue(client);
    const manager = new StoreClientManager(config, factory);

    await expect(manager.getClient()).rejects.toThrow(ConnectionError);
    await expect(manager.getClient()).resolves.toBe(client);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("wraps a factory that throws", async () => {
    const factory = vi.fn(() => {
      throw new Error("invalid host");
    });
    const manager = new StoreClientManager(config, factory);

    await expect(manager.getClient()).rejects.toThrow(
      "Cannot reach Chroma at http://localhost:9500: invalid host"
    );
  });

  it("builds a fresh client after reset", async () => {
    const factory = vi.fn().mockImplementation(() => fakeClient());
    const manager = new StoreClientManager(config, factory);

    const first = await manager.getClient();
    manager.reset();
    const second = await manager.getClient();

    expect(second).not.toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("counts resets in its generation", () => {
    const manager = new StoreClientManager(config, vi.fn());

    expect(manager.generation).toBe(0);
    manager.reset();
    manager.reset();
    expect(manager.generation).toBe(2);
  });

  it("formats its address with the configured scheme", () => {
    const manager = new StoreClientManager({ host: "chroma.internal", port: 443, ssl: true });

    expect(manager.address).toBe("https://chroma.internal:443");
  });
});
