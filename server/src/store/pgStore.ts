import { z } from "zod";
import type { Queryable } from "../config/db";
import {
  fail,
  ok,
  type Category,
  type NewQuestion,
  type Question,
  type QuestionFilter,
  type StoreError,
  type StoreResult,
  type TriviaStore,
} from "./types";

const CategoryRow = z.object({
  id: z.coerce.number().int(),
  type: z.string(),
});

const QuestionRow = z.object({
  id: z.coerce.number().int(),
  question: z.string(),
  answer: z.string(),
  category: z.coerce.number().int(),
  difficulty: z.coerce.number().int(),
});

const NowRow = z.object({ now: z.coerce.date() });

const QUESTION_COLUMNS = "id, question, answer, category, difficulty";

// % and _ in a search term match themselves, not any character
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function sqlState(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/** SQLSTATE class 22 (data exception) and 23 (integrity) are the caller's fault. */
export function classifyPgError(err: unknown): StoreError {
  const message = err instanceof Error ? err.message : String(err);
  const code = sqlState(err);
  if (code && (code.startsWith("22") || code.startsWith("23"))) {
    return { kind: "ValidationFailed", message };
  }
  return { kind: "StoreUnavailable", message, cause: err };
}

export class PgTriviaStore implements TriviaStore {
  constructor(private readonly db: Queryable) {}

  private async rows<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    text: string,
    params: unknown[] = []
  ): Promise<StoreResult<T[]>> {
    try {
      const r = await this.db.query(text, params);
      return ok(z.array(schema).parse(r.rows));
    } catch (err) {
      return fail(classifyPgError(err));
    }
  }

  listCategories() {
    return this.rows(CategoryRow, "SELECT id, type FROM categories ORDER BY id ASC");
  }

  async findCategory(id: number): Promise<StoreResult<Category>> {
    const r = await this.rows(CategoryRow, "SELECT id, type FROM categories WHERE id = $1", [id]);
    if (!r.ok) return r;
    const [row] = r.value;
    return row ? ok(row) : fail({ kind: "NotFound", entity: "category", id });
  }

  listQuestions(filter: QuestionFilter = {}) {
    const whereParts: string[] = [];
    const params: unknown[] = [];
    let i = 1;

    if (filter.searchTerm !== undefined) {
      params.push(`%${escapeLike(filter.searchTerm)}%`);
      whereParts.push(`question ILIKE $${i++} ESCAPE '\\'`);
    }
    if (filter.categoryId !== undefined) {
      params.push(filter.categoryId);
      whereParts.push(`category = $${i++}`);
    }
    if (filter.excludeIds && filter.excludeIds.length > 0) {
      params.push(filter.excludeIds);
      whereParts.push(`NOT (id = ANY($${i++}::int[]))`);
    }

    const where = whereParts.length ? `WHERE ${whereParts.join(" AND ")}` : "";
    return this.rows(
      QuestionRow,
      `SELECT ${QUESTION_COLUMNS} FROM questions ${where} ORDER BY id ASC`,
      params
    );
  }

  async findQuestion(id: number): Promise<StoreResult<Question>> {
    const r = await this.rows(
      QuestionRow,
      `SELECT ${QUESTION_COLUMNS} FROM questions WHERE id = $1`,
      [id]
    );
    if (!r.ok) return r;
    const [row] = r.value;
    return row ? ok(row) : fail({ kind: "NotFound", entity: "question", id });
  }

  async insertQuestion(q: NewQuestion): Promise<StoreResult<Question>> {
    const r = await this.rows(
      QuestionRow,
      `INSERT INTO questions (question, answer, category, difficulty)
       VALUES ($1, $2, $3, $4)
       RETURNING ${QUESTION_COLUMNS}`,
      [q.question, q.answer, q.category, q.difficulty]
    );
    if (!r.ok) return r;
    const [row] = r.value;
    return row
      ? ok(row)
      : fail({ kind: "StoreUnavailable", message: "insert returned no row" });
  }

  async deleteQuestion(id: number): Promise<StoreResult<void>> {
    try {
      const r = await this.db.query("DELETE FROM questions WHERE id = $1", [id]);
      return r.rowCount ? ok(undefined) : fail({ kind: "NotFound", entity: "question", id });
    } catch (err) {
      return fail(classifyPgError(err));
    }
  }

  async ping(): Promise<StoreResult<Date>> {
    const r = await this.rows(NowRow, "SELECT NOW() AS now");
    if (!r.ok) return r;
    const [row] = r.value;
    return row ? ok(row.now) : fail({ kind: "StoreUnavailable", message: "no rows from ping" });
  }
}
