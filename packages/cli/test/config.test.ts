import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { readConfig, resolveRuntimeConfig, writeConfig } from "../src/config.js";
import { CliError } from "../src/errors.js";

describe("runtime config", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function tempPath() {
    const dir = mkdtempSync(join(tmpdir(), "supabase-mcp-config-"));
    dirs.push(dir);
    return join(dir, "nested", "config.json");
  }

  it("falls back to defaults", () => {
    expect(resolveRuntimeConfig({}, {}, {})).toEqual({
      executable: "manus-mcp-cli",
      serverName: "supabase",
      timeoutMs: 30_000,
      accessTokenPresent: false
    });
  });

  it("prefers overrides, then environment, then the config file", () => {
    const fileConfig = { executable: "from-file", serverName: "file-server", timeoutSeconds: 12 };
    const env = { SUPABASE_MCP_SERVER: "env-server", SUPABASE_ACCESS_TOKEN: "test-token" };

    expect(resolveRuntimeConfig({ timeout: "2.5" }, env, fileConfig)).toEqual({
      executable: "from-file",
      serverName: "env-server",
      timeoutMs: 2_500,
      accessTokenPresent: true
    });
    expect(resolveRuntimeConfig({ serverName: " cli-server " }, env, fileConfig).serverName).toBe("cli-server");
    expect(resolveRuntimeConfig({}, {}, fileConfig).timeoutMs).toBe(12_000);
  });

  it("ignores blank values", () => {
    const config = resolveRuntimeConfig({ executable: "  " }, { SUPABASE_ACCESS_TOKEN: " " }, {});
    expect(config.executable).toBe("manus-mcp-cli");
    expect(config.accessTokenPresent).toBe(false);
  });

  it("rejects timeouts that are not positive numbers", () => {
    expect(() => resolveRuntimeConfig({ timeout: "0" }, {}, {})).toThrow(CliError);
    expect(() => resolveRuntimeConfig({}, { SUPABASE_MCP_TIMEOUT_SECONDS: "soon" }, {})).toThrow(
      "SUPABASE_MCP_TIMEOUT_SECONDS must be a positive number of seconds"
    );
  });

  it("rejects timeouts longer than a timer can hold from every source", () => {
    const tooLong = "2147484";

    expect(() => resolveRuntimeConfig({ timeout: tooLong }, {}, {})).toThrow(
      "--timeout must be between 0.001 and 2147483.647 seconds"
    );
    expect(() => resolveRuntimeConfig({}, { SUPABASE_MCP_TIMEOUT_SECONDS: tooLong }, {})).toThrow(
      "SUPABASE_MCP_TIMEOUT_SECONDS must be between 0.001 and 2147483.647 seconds"
    );
    expect(() => resolveRuntimeConfig({}, {}, { timeoutSeconds: 3_000_000 })).toThrow(CliError);
    expect(resolveRuntimeConfig({ timeout: "2147483.647" }, {}, {}).timeoutMs).toBe(2_147_483_647);
  });

  it("round-trips the config file", () => {
    const path = tempPath();

    writeConfig({ executable: "/usr/local/bin/connector", timeoutSeconds: 45 }, path);

    expect(readConfig(path)).toEqual({ executable: "/usr/local/bin/connector", timeoutSeconds: 45 });
    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({
      executable: "/usr/local/bin/connector",
      timeoutSeconds: 45
    });
  });

  it("treats missing or invalid config files as empty", () => {
    const path = tempPath();
    expect(readConfig(path)).toEqual({});

    writeConfig({}, path);
    writeFileSync(path, JSON.stringify({ timeoutSeconds: -3 }));
    expect(readConfig(path)).toEqual({});
  });
});
