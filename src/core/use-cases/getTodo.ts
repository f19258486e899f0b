import type { TodoView } from "../entities/todo";
import { parseTodoId, toView } from "../mappers/todoMapper";
import type { TodoRepository } from "../ports/TodoRepository";
import { NotFoundError } from "../../errors";

export default (repo: TodoRepository) => async (rawId: string): Promise<TodoView> => {
  const record = await repo.findById(parseTodoId(rawId));
  if (!record) throw new NotFoundError("Todo not found");
  return toView(record);
};
