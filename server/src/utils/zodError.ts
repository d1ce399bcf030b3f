// server/src/utils/zodError.ts
import type { ZodError, ZodIssue } from "zod";

export type SimplifiedIssue = {
  code: string;
  path: string;
  message: string;
  union?: true;
};

export function formatZodError(err: ZodError) {
  // Flatten union branch errors so you can see which branch failed on what
  function simplify(i: ZodIssue): SimplifiedIssue {
    return {
      code: i.code,
      path: i.path.join("."),
      message: i.message,
    };
  }

  const top = err.issues.map(simplify);
  const union = err.issues.flatMap((i) =>
    i.code === "invalid_union"
      ? i.unionErrors.flatMap((e) =>
          e.issues.map((u): SimplifiedIssue => ({ ...simplify(u), union: true }))
        )
      : []
  );

  return { top, union };
}

/** One line per issue, e.g. `DATABASE_URL: Required`. */
export function describeZodError(err: ZodError): string {
  return formatZodError(err)
    .top.map((i) => `${i.path || "(root)"}: ${i.message}`)
    .join("; ");
}
