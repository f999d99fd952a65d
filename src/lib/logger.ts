import { Console } from "node:console";
import { ansiColorFormatter, configure, getConsoleSink, getLogger } from "@logtape/logtape";
import type { LogLevel, Logger } from "@logtape/logtape";

export const ROOT_CATEGORY = "homarr-adapter";

export async function configureLogger(opts: { level: LogLevel }): Promise<void> {
  // Logs go to stderr so that command summaries on stdout stay parseable.
  const stderr = new Console({ stdout: process.stderr, stderr: process.stderr });
  await configure({
    reset: true,
    sinks: { pretty: getConsoleSink({ console: stderr, formatter: ansiColorFormatter }) },
    loggers: [
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["pretty"] },
      { category: [ROOT_CATEGORY], lowestLevel: opts.level, sinks: ["pretty"] },
    ],
  });
}

export function logger(...category: string[]): Logger {
  return getLogger([ROOT_CATEGORY, ...category]);
}
