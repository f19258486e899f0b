import { describe, it, expect, vi, afterEach } from "vitest";
import express from "express";
import { main, run, type Store } from "../src/bootstrap";
import { startHttpServer } from "../src/lifecycle";
import InMemoryTodoRepository from "../src/infrastructure/repositories/inMemoryTodoRepository";
import { ConfigError } from "../src/errors";

function memoryStore(close: () => Promise<void> = async () => {}): Store {
  return { repo: new InMemoryTodoRepository(), close };
}

describe("main", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("refuses to start without a connection string", async () => {
    const open = vi.fn(async () => memoryStore());

    await expect(main({}, open)).rejects.toThrow(
      new ConfigError("MONGO_URI environment variable is not set")
    );
    await expect(main({}, open)).rejects.toBeInstanceOf(ConfigError);
    expect(open).not.toHaveBeenCalled();
  });

  it("passes a store connection failure through", async () => {
    const open = vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED 127.0.0.1:27017"));

    await expect(main({ MONGO_URI: "mongodb://127.0.0.1:27017" }, open)).rejects.toThrow(
      "connect ECONNREFUSED 127.0.0.1:27017"
    );
    expect(open).toHaveBeenCalledWith(
      expect.objectContaining({ store: "mongo", mongo: expect.objectContaining({ dbName: "demo_todo" }) })
    );
  });

  it("closes the store when the listener cannot start", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const taken = await startHttpServer(express(), { port: 0, host: "127.0.0.1" });
    const close = vi.fn(async () => {});

    try {
      await expect(
        main({ TODO_STORE: "memory", PORT: String(taken.port), HOST: "127.0.0.1" }, async () => memoryStore(close))
      ).rejects.toMatchObject({ code: "EADDRINUSE" });
    } finally {
      await taken.stop();
    }
    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe("run", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("logs a fatal startup error and exits non-zero", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    await run({});

    expect(error).toHaveBeenCalledWith("MONGO_URI environment variable is not set");
    expect(process.exitCode).toBe(1);
  });
});
