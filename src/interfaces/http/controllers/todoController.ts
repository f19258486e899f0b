import type { NextFunction, Request, Response } from "express";
import type { TodoView } from "../../../core/entities/todo";

export interface TodoControllerDeps {
  listTodos: () => Promise<TodoView[]>;
  getTodo: (id: string) => Promise<TodoView>;
  createTodo: (body: unknown) => Promise<string>;
  updateTodo: (id: string, body: unknown) => Promise<void>;
  deleteTodo: (id: string) => Promise<void>;
}

type IdParams = { id: string };

export default function createTodoController(deps: TodoControllerDeps) {
  return {
    list: async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const items = await deps.listTodos();
        res.status(200).json({ data: items });
      } catch (e) {
        next(e);
      }
    },

    get: async (req: Request<IdParams>, res: Response, next: NextFunction) => {
      try {
        const item = await deps.getTodo(req.params.id);
        res.status(200).json({ data: item });
      } catch (e) {
        next(e);
      }
    },

    create: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = await deps.createTodo(req.body);
        res.status(200).json({ message: "Todo successfully saved", "Todo ID": id });
      } catch (e) {
        next(e);
      }
    },

    update: async (req: Request<IdParams>, res: Response, next: NextFunction) => {
      try {
        await deps.updateTodo(req.params.id, req.body);
        res.status(200).json({ message: "Successfully updated TODO" });
      } catch (e) {
        next(e);
      }
    },

    remove: async (req: Request<IdParams>, res: Response, next: NextFunction) => {
      try {
        await deps.deleteTodo(req.params.id);
        res.status(200).json({ message: "Successfully deleted TODO" });
      } catch (e) {
        next(e);
      }
    },
  };
}
