import { Router } from "express";
import createTodoController, { type TodoControllerDeps } from "../controllers/todoController";

export function todoRoutes(deps: TodoControllerDeps) {
  const controller = createTodoController(deps);
  const router = Router();

  router.get("/", controller.list);
  router.post("/", controller.create);
  router.get("/:id", controller.get);
  router.put("/:id", controller.update);
  router.delete("/:id", controller.remove);

  return router;
}
