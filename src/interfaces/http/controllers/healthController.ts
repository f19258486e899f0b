import type { Request, Response } from "express";

export interface HealthDeps {
  checkStore: () => Promise<void>;
}

export default function createHealthController(deps: HealthDeps) {
  return async (_req: Request, res: Response) => {
    const uptime = process.uptime();
    try {
      await deps.checkStore();
      res.status(200).json({ status: "ok", store: "up", uptime });
    } catch (e) {
      console.error("health check failed:", e);
      res.status(503).json({ status: "degraded", store: "down", uptime });
    }
  };
}
