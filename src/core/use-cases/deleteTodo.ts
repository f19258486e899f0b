import { parseTodoId } from "../mappers/todoMapper";
import type { TodoRepository } from "../ports/TodoRepository";
import { NotFoundError } from "../../errors";

export default (repo: TodoRepository) => async (rawId: string): Promise<void> => {
  const deleted = await repo.deleteById(parseTodoId(rawId));
  if (deleted === 0) throw new NotFoundError("Todo not found");
};
