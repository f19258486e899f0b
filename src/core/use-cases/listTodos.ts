import type { TodoView } from "../entities/todo";
import { toView } from "../mappers/todoMapper";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (): Promise<TodoView[]> => {
  const records = await repo.findAll();
  return records.map(toView);
};
