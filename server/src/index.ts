import { createApp } from "./app";
import { asQueryable, createPool } from "./config/db";
import { ConfigError, loadConfigFromDotenv } from "./config/env";
import { PgTriviaStore } from "./store/pgStore";
import { describeStoreError } from "./store/types";

async function main() {
  const config = loadConfigFromDotenv();
  const pool = createPool(config);
  const store = new PgTriviaStore(asQueryable(pool));

  const ping = await store.ping();
  if (ping.ok) {
    console.log("✅ Connected to DB at:", ping.value.toISOString());
  } else {
    // keep serving; /health/db reports the outage
    console.error("❌ Database connection failed:", describeStoreError(ping.error));
  }

  const app = createApp({ store, random: Math.random }, { logFormat: config.logFormat });
  const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
  });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    console.log(`${signal} received, shutting down`);
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
    await pool.end();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("[ERR] shutdown failed:", err);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error("[ERR] startup failed:", err);
  }
  process.exit(1);
});
