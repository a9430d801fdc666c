import { findAlmanacDir, loadAlmanacConfig } from "@almanac/core";
import { createServer } from "./server.js";

async function main() {
  const almanacDir = findAlmanacDir();
  const config = loadAlmanacConfig(almanacDir);

  if (!config.calendar.directory) {
    console.warn(
      "No default calendar directory configured. Pass ?dir= to each request.",
    );
  }

  const port = parseInt(process.env.PORT ?? String(config.server.port), 10);
  const host = process.env.HOST ?? config.server.host;

  const server = await createServer({ config });

  // Graceful shutdown
  const shutdown = async () => {
    server.log.info("Shutting down...");
    await server.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await server.listen({ port, host });
  server.log.info(`Almanac dashboard listening on http://${host}:${port}`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
