#!/usr/bin/env node

import { runProbe } from "./probe.js";
import { logger } from "./log.js";

async function main() {
  await runProbe();
}

main().catch((err: unknown) => {
  const e = err instanceof Error ? err : new Error(String(err));
  logger.error("probe.error", { name: e.name, msg: e.message });
  process.exit(1);
});
