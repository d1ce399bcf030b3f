import type { ZodError } from "zod";
import type { Category } from "../store/types";
import { unprocessable, type ApiError } from "../utils/httpErrors";
import { describeZodError, formatZodError } from "../utils/zodError";

/** `{ "1": "Science", ... }`, the shape the front end indexes categories by. */
export function toCategoryMap(categories: readonly Category[]): Record<string, string> {
  const map: Record<string, string> = {};
  for (const c of categories) map[String(c.id)] = c.type;
  return map;
}

export function rejectBody(where: string, err: ZodError): ApiError {
  console.warn(`[ZOD] ${where} validation failed:`, JSON.stringify(formatZodError(err)));
  return unprocessable(describeZodError(err));
}
