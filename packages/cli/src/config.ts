import { chmodSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import {
  DEFAULT_EXECUTABLE,
  DEFAULT_SERVER_NAME,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  isValidTimeoutMs
} from "./dispatcher.js";
import { CliError } from "./errors.js";

export const ACCESS_TOKEN_ENV = "SUPABASE_ACCESS_TOKEN";

const ConnectorConfigSchema = z.object({
  executable: z.string().optional(),
  serverName: z.string().optional(),
  timeoutSeconds: z.number().positive().optional()
});

export type ConnectorConfig = z.infer<typeof ConnectorConfigSchema>;

export interface RuntimeOverrides {
  executable?: string;
  serverName?: string;
  timeout?: string;
}

export interface RuntimeConfig {
  executable: string;
  serverName: string;
  timeoutMs: number;
  accessTokenPresent: boolean;
}

const CONFIG_PATH = join(homedir(), ".supabase-mcp", "config.json");

function normalize(value?: string) {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseTimeoutSeconds(value: string | undefined, source: string) {
  const normalized = normalize(value);
  if (normalized === undefined) {
    return undefined;
  }
  const seconds = Number(normalized);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new CliError("VALIDATION_ERROR", `${source} must be a positive number of seconds`, 1, {
      value: normalized
    });
  }
  if (!isValidTimeoutMs(Math.round(seconds * 1000))) {
    throw new CliError(
      "VALIDATION_ERROR",
      `${source} must be between 0.001 and ${MAX_TIMEOUT_MS / 1000} seconds`,
      1,
      { value: normalized }
    );
  }
  return seconds;
}

export function getConfigPath() {
  return CONFIG_PATH;
}

export function readConfig(path = CONFIG_PATH): ConnectorConfig {
  try {
    const parsed = ConnectorConfigSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function writeConfig(config: ConnectorConfig, path = CONFIG_PATH) {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  try {
    chmodSync(dir, 0o700);
  } catch {
    // Best-effort on platforms that don't support chmod.
  }
  writeFileSync(path, JSON.stringify(config, null, 2));
  try {
    chmodSync(path, 0o600);
  } catch {
    // Best-effort on platforms that don't support chmod.
  }
}

export function resolveRuntimeConfig(
  overrides: RuntimeOverrides,
  env: NodeJS.ProcessEnv = process.env,
  fileConfig: ConnectorConfig = readConfig()
): RuntimeConfig {
  const executable =
    normalize(overrides.executable) ??
    normalize(env.SUPABASE_MCP_EXECUTABLE) ??
    normalize(fileConfig.executable) ??
    DEFAULT_EXECUTABLE;
  const serverName =
    normalize(overrides.serverName) ??
    normalize(env.SUPABASE_MCP_SERVER) ??
    normalize(fileConfig.serverName) ??
    DEFAULT_SERVER_NAME;
  const timeoutSeconds =
    parseTimeoutSeconds(overrides.timeout, "--timeout") ??
    parseTimeoutSeconds(env.SUPABASE_MCP_TIMEOUT_SECONDS, "SUPABASE_MCP_TIMEOUT_SECONDS") ??
    parseTimeoutSeconds(fileConfig.timeoutSeconds?.toString(), "`timeoutSeconds` in the config file");

  return {
    executable,
    serverName,
    timeoutMs: timeoutSeconds !== undefined ? Math.round(timeoutSeconds * 1000) : DEFAULT_TIMEOUT_MS,
    accessTokenPresent: normalize(env[ACCESS_TOKEN_ENV]) !== undefined
  };
}
