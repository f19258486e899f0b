import type { ObjectId } from "mongodb";

export interface TodoRecord {
  id: ObjectId;
  title: string;
  completed: boolean;
  createdAt: Date;
}

export type NewTodoRecord = Omit<TodoRecord, "id">;

export type TodoFields = Pick<TodoRecord, "title" | "completed">;

export interface TodoView {
  id: string;
  title: string;
  completed: boolean;
  create_at: string; // ISO string
}

export function newTodo(params: { title: string; createdAt?: Date }): NewTodoRecord {
  return {
    title: params.title,
    completed: false,
    createdAt: params.createdAt ?? new Date(),
  };
}
