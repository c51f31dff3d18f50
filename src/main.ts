#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import process from "node:process";

import { loadDispatchSettings } from "./config/settings.js";
import { createToolRuntime } from "./runtime.js";
import { createToolServer } from "./server.js";

/** Serves the runtime over stdio until the process receives SIGINT or SIGTERM. */
async function main(): Promise<void> {
  const settings = loadDispatchSettings();
  const runtime = createToolRuntime(settings);
  const server = createToolServer(runtime);
  await server.connect(new StdioServerTransport());
  runtime.logger.info("server_started", {
    transport: "stdio",
    tools: runtime.registry.size,
    write_gate: runtime.writeGate.snapshot(),
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    runtime.logger.info("server_stopping", { signal });
    await server.close();
    await runtime.logger.flush();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      process.stderr.write(`shutdown failed: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
  process.exit(1);
});
