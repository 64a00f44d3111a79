#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "fs";
import { runLive, runMetrics, runSnapshot, type AppIo } from "./app.js";
import { USAGE, parseArgs } from "./cli/args.js";
import { MetricsCollector } from "./collector/index.js";
import { loadConfig } from "./config/loader.js";
import { ConfigError } from "./errors.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return;
  }
  if (options.version) {
    console.log(readVersion());
    return;
  }

  const config = loadConfig(options.configPath, options.flags);
  const collector = new MetricsCollector();
  const io: AppIo = {
    output: process.stdout,
    input: process.stdin,
    print: (text) => console.log(text),
  };

  if (options.command === "metrics") {
    await runMetrics(collector, io);
    return;
  }

  if (options.json) {
    await runSnapshot(config, collector, io);
    return;
  }

  const controller = new AbortController();
  const shutdown = () => controller.abort();
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await runLive(config, collector, io, {
      once: options.once,
      signal: controller.signal,
      onInterrupt: shutdown,
    });
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  }
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`error: ${error.message}`);
    console.error("Run with --help for usage.");
    process.exit(2);
  }
  console.error("Fatal error:", error);
  process.exit(1);
});
