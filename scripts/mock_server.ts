import { startMockServer } from "../src/mockServer.js";
import { formatResources, formatTools, parseMockCommand, usage, UsageError } from "../src/mockCommands.js";
import { listTools } from "../src/tools.js";
import { listResources } from "../src/resources.js";
import { config } from "../src/config.js";
import { logger } from "../src/log.js";

async function main() {
  const command = parseMockCommand(process.argv.slice(2), { host: config.host, port: config.port });

  switch (command.kind) {
    case "list-tools":
      for (const line of formatTools(listTools())) console.log(line);
      return;
    case "list-resources":
      for (const line of formatResources(listResources())) console.log(line);
      return;
    case "start":
      break;
  }

  const server = await startMockServer({ host: command.host, port: command.port });

  const shutdown = (sig: string) => {
    logger.info("shutdown", { signal: sig });
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("shutdown.error", { msg: String(err instanceof Error ? err.message : err) });
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`${err.message}\n${usage}`);
    process.exit(2);
  }
  logger.error("mock.error", { msg: String(err instanceof Error ? err.message : err) });
  process.exit(1);
});
