import { describe, it, expect } from "vitest";
import express from "express";
import { startHttpServer } from "../src/lifecycle";

function slowApp() {
  let release: () => void = () => {};
  let arrived: () => void = () => {};
  const requestArrived = new Promise<void>((resolve) => {
    arrived = resolve;
  });
  const app = express();
  app.get("/slow", async (_req, res) => {
    arrived();
    await new Promise<void>((resolve) => {
      release = resolve;
    });
    res.json({ done: true });
  });
  return { app, requestArrived, release: () => release() };
}

describe("startHttpServer", () => {
  it("reports the port it bound", async () => {
    const running = await startHttpServer(express(), { port: 0, host: "127.0.0.1" });
    expect(running.port).toBeGreaterThan(0);
    await running.stop();
  });

  it("lets an in-flight request finish before stopping", async () => {
    const { app, requestArrived, release } = slowApp();
    const running = await startHttpServer(app, { port: 0, host: "127.0.0.1" });

    const response = fetch(`http://127.0.0.1:${running.port}/slow`);
    await requestArrived;

    let stopped = false;
    const stopping = running.stop(2000).then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(stopped).toBe(false);

    release();
    const res = await response;
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ done: true });
    await stopping;
    expect(running.server.listening).toBe(false);
  });

  it("abandons requests still open after the timeout", async () => {
    const { app, requestArrived } = slowApp();
    const running = await startHttpServer(app, { port: 0, host: "127.0.0.1" });

    const response = fetch(`http://127.0.0.1:${running.port}/slow`);
    await requestArrived;

    await running.stop(50);

    await expect(response).rejects.toThrow();
  });
});
