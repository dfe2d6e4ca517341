/**
 * API Server
 *
 * Fastify entry point. Boots the platform, registers routes, starts listening.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { closeDatabase, flushObservability, captureException } from "@keepsync/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

async function main() {
  const { config, catalog } = bootstrap();
  const app = await buildServer(catalog);

  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });

  console.log(`\n  API running at http://localhost:${config.api.port}\n`);

  const shutdown = async () => {
    console.log("\n[shutdown] Closing...");
    await app.close();
    await flushObservability(2000);
    await closeDatabase();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch(async (err) => {
  console.error("Fatal error:", err);
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000).catch((flushErr) => console.error("Flush failed:", flushErr));
  process.exit(1);
});
