import { ObjectId } from "mongodb";
import type { TodoRecord, TodoView } from "../entities/todo";
import { ValidationError } from "../../errors";

const HEX_ID = /^[0-9a-fA-F]{24}$/;

/** Structural check only; says nothing about whether the todo exists. */
export function parseTodoId(raw: string): ObjectId {
  const id = raw.trim();
  if (!HEX_ID.test(id)) throw new ValidationError("Invalid ID");
  return ObjectId.createFromHexString(id);
}

export function toView(record: TodoRecord): TodoView {
  return {
    id: record.id.toHexString(),
    title: record.title,
    completed: record.completed,
    create_at: record.createdAt.toISOString(),
  };
}

export function toRecord(view: TodoView): TodoRecord {
  const createdAt = new Date(view.create_at);
  if (Number.isNaN(createdAt.getTime())) throw new ValidationError("Invalid create_at");
  return {
    id: parseTodoId(view.id),
    title: view.title,
    completed: view.completed,
    createdAt,
  };
}
