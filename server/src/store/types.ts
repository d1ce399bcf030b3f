export type Category = {
  id: number;
  type: string;
};

export type Question = {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number;
};

export type NewQuestion = Omit<Question, "id">;

export type QuestionFilter = {
  /** case-insensitive substring of the question text */
  searchTerm?: string;
  categoryId?: number;
  excludeIds?: number[];
};

export type StoreError =
  | { kind: "NotFound"; entity: "question" | "category"; id: number }
  | { kind: "ValidationFailed"; message: string }
  | { kind: "StoreUnavailable"; message: string; cause?: unknown };

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StoreError };

export const ok = <T>(value: T): StoreResult<T> => ({ ok: true, value });
export const fail = <T = never>(error: StoreError): StoreResult<T> => ({ ok: false, error });

/**
 * Persistence boundary for questions and categories. Expected failures come
 * back as `{ ok: false }`; implementations do not throw for them.
 */
export interface TriviaStore {
  listCategories(): Promise<StoreResult<Category[]>>;
  findCategory(id: number): Promise<StoreResult<Category>>;
  /** Ordered by id ascending. */
  listQuestions(filter?: QuestionFilter): Promise<StoreResult<Question[]>>;
  findQuestion(id: number): Promise<StoreResult<Question>>;
  insertQuestion(q: NewQuestion): Promise<StoreResult<Question>>;
  deleteQuestion(id: number): Promise<StoreResult<void>>;
  ping(): Promise<StoreResult<Date>>;
}

export function describeStoreError(error: StoreError): string {
  switch (error.kind) {
    case "NotFound":
      return `${error.entity} ${error.id} not found`;
    case "ValidationFailed":
      return `validation failed: ${error.message}`;
    case "StoreUnavailable":
      return `store unavailable: ${error.message}`;
  }
}
