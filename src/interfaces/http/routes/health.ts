import { Router } from "express";
import createHealthController, { type HealthDeps } from "../controllers/healthController";

export function healthRoutes(deps: HealthDeps) {
  const router = Router();
  router.get("/health", createHealthController(deps));
  return router;
}
