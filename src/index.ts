#!/usr/bin/env node
import { buildApplication } from "./composition/container";
import { loadEnv } from "./env";

async function main() {
  const env = loadEnv();
  if (!env.openAiApiKey) {
    console.error("Missing OPENAI_API_KEY. Add it to .env or pass --api-key.");
    process.exit(1);
  }

  const app = buildApplication(env);
  if (app.logging.logPath) {
    console.log(`Logging output to ${app.logging.logPath}`);
  }
  if (env.debugMode) {
    console.log("🐞 Debug mode is enabled.");
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      console.warn("Shutdown failed:", err);
    }
  };

  process.on("SIGINT", () => {
    console.log("\nExiting…");
    shutdown().finally(() => process.exit(0));
  });

  await app.start();
  await shutdown();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
