import { createPool, loadSchemaSql } from "./config/db";
import { loadConfigFromDotenv } from "./config/env";
import type { NewQuestion } from "./store/types";

const categories = ["Science", "Art", "Geography", "History", "Entertainment", "Sports"];

// category ids follow the order above, starting at 1
const seeds: NewQuestion[] = [
  { question: "What gas do plants absorb from the air?", answer: "Carbon dioxide", category: 1, difficulty: 1 },
  { question: "How many bones are in the adult human body?", answer: "206", category: 1, difficulty: 3 },
  { question: "Which primary colour mixes with blue to make green?", answer: "Yellow", category: 2, difficulty: 1 },
  { question: "What is the longest river in South America?", answer: "The Amazon", category: 3, difficulty: 2 },
  { question: "Which country has the most islands?", answer: "Sweden", category: 3, difficulty: 4 },
  { question: "In which century did the printing press appear in Europe?", answer: "The 15th", category: 4, difficulty: 3 },
  { question: "Which instrument has 88 keys?", answer: "The piano", category: 5, difficulty: 1 },
  { question: "How many players does a volleyball team have on court?", answer: "Six", category: 6, difficulty: 2 },
];

async function main() {
  const config = loadConfigFromDotenv();
  const pool = createPool(config);
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(await loadSchemaSql());

    const { rows } = await client.query<{ n: number }>("SELECT COUNT(*)::int AS n FROM categories");
    if ((rows[0]?.n ?? 0) > 0) {
      console.log("Categories already present, skipping seed.");
      await client.query("ROLLBACK");
      return;
    }

    for (const type of categories) {
      await client.query("INSERT INTO categories (type) VALUES ($1)", [type]);
    }
    for (const q of seeds) {
      await client.query(
        "INSERT INTO questions (question, answer, category, difficulty) VALUES ($1, $2, $3, $4)",
        [q.question, q.answer, q.category, q.difficulty]
      );
    }

    await client.query("COMMIT");
    console.log(`✅ Seeded ${categories.length} categories and ${seeds.length} questions`);
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error("❌ Seed failed:", err);
  process.exit(1);
});
