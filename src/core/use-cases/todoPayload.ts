import { ValidationError } from "../../errors";

export interface TodoPayload {
  title?: string;
  completed?: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts any JSON object whose `title` and `completed`, when present, have
 * the right types. Other fields are ignored. `null` decodes to an empty
 * payload.
 */
export function decodeTodoPayload(body: unknown): TodoPayload {
  if (body === null || typeof body === "undefined") return {};
  if (!isPlainObject(body)) throw new ValidationError("Invalid request payload");

  const { title, completed } = body;
  if (typeof title !== "undefined" && typeof title !== "string") {
    throw new ValidationError("Invalid request payload");
  }
  if (typeof completed !== "undefined" && typeof completed !== "boolean") {
    throw new ValidationError("Invalid request payload");
  }
  return { title, completed };
}

/** Whitespace-only titles count as empty; the title itself is kept as sent. */
export function requireTitle(title: string | undefined): string {
  if (!title?.trim()) throw new ValidationError("Title field is required");
  return title;
}
