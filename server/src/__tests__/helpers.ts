/**
 * Test helpers: an in-memory TriviaStore and a real HTTP server around the
 * app, listening on an ephemeral port.
 */

import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { createApp } from "../app";
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
} from "../store/types";

export class MemoryTriviaStore implements TriviaStore {
  categories: Category[] = [];
  questions: Question[] = [];
  /** When set, every operation fails with this error. */
  failure: StoreError | null = null;
  private nextId = 1;

  constructor(seed: { categories?: Category[]; questions?: NewQuestion[] } = {}) {
    this.categories = [...(seed.categories ?? [])];
    for (const q of seed.questions ?? []) this.add(q);
  }

  add(q: NewQuestion): Question {
    const row = { id: this.nextId++, ...q };
    this.questions.push(row);
    return row;
  }

  private run<T>(fn: () => StoreResult<T>): Promise<StoreResult<T>> {
    return Promise.resolve(this.failure ? fail(this.failure) : fn());
  }

  listCategories() {
    return this.run(() => ok(this.categories.map((c) => ({ ...c }))));
  }

  findCategory(id: number) {
    return this.run((): StoreResult<Category> => {
      const c = this.categories.find((x) => x.id === id);
      return c ? ok({ ...c }) : fail({ kind: "NotFound", entity: "category", id });
    });
  }

  listQuestions(filter: QuestionFilter = {}) {
    return this.run(() => {
      const term = filter.searchTerm?.toLowerCase();
      const exclude = new Set(filter.excludeIds ?? []);
      return ok(
        this.questions
          .filter((q) => term === undefined || q.question.toLowerCase().includes(term))
          .filter((q) => filter.categoryId === undefined || q.category === filter.categoryId)
          .filter((q) => !exclude.has(q.id))
          .sort((a, b) => a.id - b.id)
          .map((q) => ({ ...q }))
      );
    });
  }

  findQuestion(id: number) {
    return this.run((): StoreResult<Question> => {
      const q = this.questions.find((x) => x.id === id);
      return q ? ok({ ...q }) : fail({ kind: "NotFound", entity: "question", id });
    });
  }

  insertQuestion(q: NewQuestion) {
    return this.run(() => ok({ ...this.add(q) }));
  }

  deleteQuestion(id: number) {
    return this.run((): StoreResult<void> => {
      const before = this.questions.length;
      this.questions = this.questions.filter((q) => q.id !== id);
      return this.questions.length < before
        ? ok(undefined)
        : fail({ kind: "NotFound", entity: "question", id });
    });
  }

  ping() {
    return this.run(() => ok(new Date("2024-01-01T00:00:00.000Z")));
  }
}

export const CATEGORIES: Category[] = [
  { id: 1, type: "Science" },
  { id: 2, type: "Art" },
  { id: 3, type: "Geography" },
];

/** `count` questions, cycling through categories 1..3. */
export function makeQuestions(count: number): NewQuestion[] {
  return Array.from({ length: count }, (_, i) => ({
    question: `Question number ${i + 1}?`,
    answer: `Answer ${i + 1}`,
    category: (i % 3) + 1,
    difficulty: (i % 5) + 1,
  }));
}

export type TestServer = {
  url: string;
  close: () => Promise<void>;
};

export async function startTestServer(
  store: TriviaStore,
  random: () => number = Math.random
): Promise<TestServer> {
  const app = createApp({ store, random }, { logFormat: null });
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") {
    throw new Error(`unexpected server address: ${String(address)}`);
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      ),
  };
}

export type JsonResponse = {
  status: number;
  headers: Headers;
  body: Record<string, unknown>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function request(
  server: TestServer,
  method: string,
  path: string,
  body?: unknown
): Promise<JsonResponse> {
  const res = await fetch(`${server.url}${path}`, {
    method,
    headers: body === undefined ? {} : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
  });
  const text = await res.text();
  const parsed: unknown = text ? JSON.parse(text) : {};
  if (!isRecord(parsed)) throw new Error(`expected a JSON object from ${method} ${path}, got: ${text}`);
  return { status: res.status, headers: res.headers, body: parsed };
}
