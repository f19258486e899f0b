import { newTodo } from "../entities/todo";
import type { TodoRepository } from "../ports/TodoRepository";
import { decodeTodoPayload, requireTitle } from "./todoPayload";

/** Resolves to the new todo's id; `completed` always starts false. */
export default (repo: TodoRepository) => async (body: unknown): Promise<string> => {
  const { title } = decodeTodoPayload(body);
  const id = await repo.insert(newTodo({ title: requireTitle(title) }));
  return id.toHexString();
};
