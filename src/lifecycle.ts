import type { Server } from "http";
import type { Express } from "express";

export interface RunningServer {
  server: Server;
  port: number;
  /**
   * Stops accepting connections and waits for in-flight requests. Whatever
   * is still open after `timeoutMs` is cut off.
   */
  stop(timeoutMs?: number): Promise<void>;
}

export function startHttpServer(
  app: Express,
  { port, host }: { port: number; host?: string }
): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host ?? "0.0.0.0");

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const bound = address !== null && typeof address === "object" ? address.port : port;
      resolve({ server, port: bound, stop: (timeoutMs = 5000) => stopServer(server, timeoutMs) });
    });
  });
}

function stopServer(server: Server, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => server.closeAllConnections(), timeoutMs);
    server.close((err) => {
      clearTimeout(timer);
      if (err) reject(err);
      else resolve();
    });
    server.closeIdleConnections();
  });
}
