#!/usr/bin/env node
import "./env.js";
import { loadConfig } from "./config.js";
import { runUpdate } from "./index.js";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  await runUpdate(config);
}

main().catch((error: unknown) => {
  console.error("Events update failed", error);
  process.exitCode = 1;
});
