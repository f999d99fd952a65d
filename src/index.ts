#!/usr/bin/env tsx
import { parseArgs } from "node:util";
import { loadConfig, DEFAULT_CONFIG_PATH, type AdapterConfig } from "./lib/config.ts";
import type { ExitCode } from "./lib/exit-codes.ts";
import { configureLogger } from "./lib/logger.ts";

const commands: Record<
  string,
  () => Promise<{ run: (args: string[], config: AdapterConfig) => Promise<ExitCode> }>
> = {
  setup: () => import("./commands/setup.ts"),
  sync: () => import("./commands/sync.ts"),
  status: () => import("./commands/status.ts"),
  remove: () => import("./commands/remove.ts"),
};

function printHelp() {
  console.log(`Usage: homarr-container-adapter [options] <command>

Commands:
  setup            Rotate credentials, onboard Homarr and apply branding
  sync             Add tiles for labelled Docker containers
  status           Show adapter state
  remove <app-id>  Delete an app's tile and exclude it from future syncs

Options:
  -c, --config <path>  Config file (default: ${DEFAULT_CONFIG_PATH})
  -d, --debug          Verbose logging
  -h, --help           Show this help`);
}

function parseCli() {
  try {
    return parseArgs({
      args: process.argv.slice(2),
      options: {
        config: { type: "string", short: "c" },
        debug: { type: "boolean", short: "d", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: true,
    });
  } catch (err) {
    console.error(`${err instanceof Error ? err.message : String(err)}\n`);
    printHelp();
    process.exit(1);
  }
}

const { values, positionals } = parseCli();
const [command, ...args] = positionals;

if (!command || values.help) {
  printHelp();
  process.exit(0);
}

const loader = commands[command];
if (!loader) {
  console.error(`Unknown command: ${command}\n`);
  printHelp();
  process.exit(1);
}

try {
  await configureLogger({ level: values.debug ? "debug" : "info" });
  const config = loadConfig(values.config ?? DEFAULT_CONFIG_PATH);
  const mod = await loader();
  process.exit(await mod.run(args, config));
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
