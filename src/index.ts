import { loadConfig } from "./config";
import { connectDb, disconnectDb } from "./db";
import { createApp } from "./server/app";
import { startServer, closeServer } from "./server/startServer";
import { createMongoStore } from "./store/mongoStore";
import { createMemoryPositionStore } from "./state/positionStore";
import { seedChallenges } from "./services/seedChallenges";

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function main() {
  const config = loadConfig();
  console.log(`[BOOT] Starting in ${config.env} mode`);

  // DB connection
  const conn = await connectDb(config.mongoUri);
  console.log("[DB] Connected to MongoDB:", conn.name);

  const store = createMongoStore();

  if (config.seedChallenges) {
    await seedChallenges(store.repos.challenges);
  }

  const app = createApp({
    store,
    positions: createMemoryPositionStore(),
    jwtSecret: config.jwtSecret,
    defaultTimezone: config.defaultTimezone,
  });

  const server = await startServer(app, config.port);

  async function shutdown(signal: string) {
    console.log(`Shutdown signal received: ${signal}`);

    try {
      await closeServer(server);
    } catch (e) {
      console.error("Server close error:", e);
    }

    try {
      await disconnectDb();
    } catch (e) {
      console.error("DB disconnect error:", e);
    }

    // Small delay to let logs flush
    await sleep(250);

    process.exit(0);
  }

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error("Fatal startup error:", e);
  process.exit(1);
});
