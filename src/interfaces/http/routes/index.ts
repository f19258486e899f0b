import { Router } from "express";
import { healthRoutes } from "./health";
import { todoRoutes } from "./todos";
import type { HealthDeps } from "../controllers/healthController";
import type { TodoControllerDeps } from "../controllers/todoController";

export type HttpRouterDeps = TodoControllerDeps & HealthDeps;

export function makeHttpRouter(deps: HttpRouterDeps) {
  const router = Router();

  router.use(healthRoutes(deps));
  router.use("/todo", todoRoutes(deps));

  return router;
}
