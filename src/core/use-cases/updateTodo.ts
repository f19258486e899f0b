import { parseTodoId } from "../mappers/todoMapper";
import type { TodoRepository } from "../ports/TodoRepository";
import { NotFoundError } from "../../errors";
import { decodeTodoPayload, requireTitle } from "./todoPayload";

/**
 * Replaces title and completed. A missing `completed` is written as false.
 * Checks run in order: id, payload shape, title.
 */
export default (repo: TodoRepository) => async (rawId: string, body: unknown): Promise<void> => {
  const id = parseTodoId(rawId);
  const payload = decodeTodoPayload(body);
  const title = requireTitle(payload.title);
  const matched = await repo.updateById(id, { title, completed: payload.completed ?? false });
  if (matched === 0) throw new NotFoundError("Todo not found");
};
