import path from "path";
import express from "express";
import cors from "cors";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import apiSpec from "./docs/openapi.json";

import type { TodoRepository } from "./core/ports/TodoRepository";
import makeCreateTodo from "./core/use-cases/createTodo";
import makeListTodos from "./core/use-cases/listTodos";
import makeGetTodo from "./core/use-cases/getTodo";
import makeUpdateTodo from "./core/use-cases/updateTodo";
import makeDeleteTodo from "./core/use-cases/deleteTodo";

import { makeHttpRouter } from "./interfaces/http/routes";
import { errorHandler, notFound } from "./interfaces/http/middlewares/errorHandler";

export const DEFAULT_STATIC_DIR = path.resolve(__dirname, "..", "static");

export interface AppDeps {
  repo: TodoRepository;
  /** morgan format; request logging is off when omitted */
  logFormat?: string;
  staticDir?: string;
}

export function createApp({ repo, logFormat, staticDir = DEFAULT_STATIC_DIR }: AppDeps) {
  const useCases = {
    createTodo: makeCreateTodo(repo),
    listTodos: makeListTodos(repo),
    getTodo: makeGetTodo(repo),
    updateTodo: makeUpdateTodo(repo),
    deleteTodo: makeDeleteTodo(repo),
    checkStore: () => repo.ping(),
  };

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (logFormat) app.use(morgan(logFormat));

  // API Docs (Swagger UI)
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(apiSpec));
  app.get("/docs-json", (_req, res) => res.json(apiSpec));

  app.get("/", (_req, res) => res.sendFile(path.join(staticDir, "home.html")));
  app.use("/static", express.static(staticDir));

  app.use(makeHttpRouter(useCases));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
