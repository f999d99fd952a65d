import { existsSync, readFileSync } from "node:fs";
import { parse } from "smol-toml";
import { z } from "zod";
import type { RetryOptions } from "../adapter/lib/retry.ts";
import { ConfigurationError, errorMessage } from "./errors.ts";
import { logger } from "./logger.ts";

export const DEFAULT_CONFIG_PATH = "/etc/homarr-container-adapter/config.toml";

export const DEFAULTS = {
  homarrUrl: "http://localhost:7575",
  stateFile: "/var/lib/homarr-container-adapter/state.json",
  brandingFile: "/etc/homarr-container-adapter/branding.toml",
  dockerSocket: "/var/run/docker.sock",
  requestTimeoutMs: 10_000,
  retry: { attempts: 5, initialDelayMs: 500, maxDelayMs: 8_000 },
} as const;

const ConfigFileSchema = z.object({
  homarr_url: z.string().url().default(DEFAULTS.homarrUrl),
  state_file: z.string().min(1).default(DEFAULTS.stateFile),
  branding_file: z.string().min(1).default(DEFAULTS.brandingFile),
  docker_socket: z.string().min(1).default(DEFAULTS.dockerSocket),
  request_timeout_ms: z.coerce.number().int().positive().default(DEFAULTS.requestTimeoutMs),
  retry: z
    .object({
      attempts: z.coerce.number().int().min(1).default(DEFAULTS.retry.attempts),
      initial_delay_ms: z.coerce.number().int().min(0).default(DEFAULTS.retry.initialDelayMs),
      max_delay_ms: z.coerce.number().int().min(0).default(DEFAULTS.retry.maxDelayMs),
    })
    .default({}),
});

export interface AdapterConfig {
  configPath: string;
  homarrUrl: string;
  stateFile: string;
  brandingFile: string;
  dockerSocket: string;
  requestTimeoutMs: number;
  retry: RetryOptions;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function readTomlFile(path: string, what: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${what} ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  try {
    return parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Invalid TOML in ${what} ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  if (env.HOMARR_URL) overrides.homarr_url = env.HOMARR_URL;
  if (env.HOMARR_ADAPTER_STATE_FILE) overrides.state_file = env.HOMARR_ADAPTER_STATE_FILE;
  if (env.HOMARR_ADAPTER_BRANDING_FILE) overrides.branding_file = env.HOMARR_ADAPTER_BRANDING_FILE;
  if (env.DOCKER_SOCKET) overrides.docker_socket = env.DOCKER_SOCKET;
  return overrides;
}

/**
 * Loads the adapter config. A missing file means "all defaults"; environment
 * variables override the file for the four location settings.
 */
export function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): AdapterConfig {
  let fromFile: Record<string, unknown> = {};
  if (existsSync(path)) {
    fromFile = readTomlFile(path, "config file");
  } else {
    logger("config").debug("No config file at {path}, using defaults", { path });
  }

  const result = ConfigFileSchema.safeParse({ ...fromFile, ...envOverrides(env) });
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${path}: ${describeIssues(result.error)}`);
  }

  const file = result.data;
  return {
    configPath: path,
    homarrUrl: file.homarr_url.replace(/\/+$/, ""),
    stateFile: file.state_file,
    brandingFile: file.branding_file,
    dockerSocket: file.docker_socket,
    requestTimeoutMs: file.request_timeout_ms,
    retry: {
      attempts: file.retry.attempts,
      initialDelayMs: file.retry.initial_delay_ms,
      maxDelayMs: file.retry.max_delay_ms,
    },
  };
}
