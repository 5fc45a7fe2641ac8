import { describe, expect, it, vi } from "vitest";
import { CommandDispatcher, normalizeOutcome, decodeJson } from "../src/dispatcher.js";
import type { ProcessOutcome, ProcessRequest } from "../src/process.js";

function exited(status: number, stdout: string, stderr = ""): ProcessOutcome {
  return { kind: "exited", status, signal: null, stdout, stderr };
}

function stubbed(outcome: ProcessOutcome) {
  const runner = vi.fn(async (_request: ProcessRequest): Promise<ProcessOutcome> => outcome);
  return { runner, dispatcher: new CommandDispatcher({ runner }) };
}

describe("command dispatcher", () => {
  it("passes a successful JSON body through unchanged", async () => {
    const { dispatcher } = stubbed(exited(0, '{"ok": true}'));

    await expect(dispatcher.invoke("get_project", { id: "p1" })).resolves.toEqual({
      ok: true,
      data: { ok: true }
    });
  });

  it("returns the organizations listing exactly", async () => {
    const { dispatcher } = stubbed(exited(0, '{"organizations": []}\n'));

    const result = await dispatcher.invoke("list_organizations", {});

    expect(result).toEqual({ ok: true, data: { organizations: [] } });
  });

  it("spawns the connector with the operation and serialized arguments", async () => {
    const { dispatcher, runner } = stubbed(exited(0, "{}"));

    await dispatcher.invoke("list_tables", { project_id: "p1", schemas: ["public", "auth"] });

    expect(runner).toHaveBeenCalledTimes(1);
    expect(runner.mock.calls[0][0]).toEqual({
      executable: "manus-mcp-cli",
      args: [
        "tool",
        "call",
        "list_tables",
        "--server",
        "supabase",
        "--input",
        '{"project_id":"p1","schemas":["public","auth"]}'
      ],
      timeoutMs: 30_000,
      env: undefined
    });
  });

  it("honours injected executable, server and timeout", async () => {
    const runner = vi.fn(async (_request: ProcessRequest): Promise<ProcessOutcome> => exited(0, "[]"));
    const dispatcher = new CommandDispatcher({
      executable: "/opt/bin/connector",
      serverName: "staging",
      timeoutMs: 5_000,
      runner
    });

    await dispatcher.invoke("list_projects");

    const request = runner.mock.calls[0][0];
    expect(request.executable).toBe("/opt/bin/connector");
    expect(request.args).toEqual(["tool", "call", "list_projects", "--server", "staging", "--input", "{}"]);
    expect(request.timeoutMs).toBe(5_000);
  });

  it("reports the remote error message and exit code", async () => {
    const { dispatcher } = stubbed(exited(1, '{"error": "syntax error", "returncode": 1}'));

    const result = await dispatcher.invoke("execute_sql", { project_id: "p1", query: "bad sql" });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "RemoteError",
        message: "syntax error",
        code: 1,
        details: { returncode: 1 }
      }
    });
  });

  it("uses the exit status as the error code for any non-zero exit", async () => {
    for (const status of [1, 2, 7, 127]) {
      const { dispatcher } = stubbed(exited(status, "", "boom"));
      const result = await dispatcher.invoke("get_project", { id: "p1" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(status);
        expect(result.error.kind).toBe("RemoteError");
      }
    }
  });

  it("falls back to stderr text when no JSON error body is present", async () => {
    const { dispatcher } = stubbed(exited(3, "", "Unauthorized: missing access token\n"));

    const result = await dispatcher.invoke("list_projects");

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "RemoteError",
        message: "Unauthorized: missing access token",
        code: 3,
        details: { stderr: "Unauthorized: missing access token\n" }
      }
    });
  });

  it("reads a JSON error body written to stderr", async () => {
    const { dispatcher } = stubbed(exited(2, "", '{"error": "project not found"}'));

    const result = await dispatcher.invoke("get_project", { id: "missing" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("project not found");
      expect(result.error.code).toBe(2);
    }
  });

  it("describes a silent failure with the executable and status", async () => {
    const { dispatcher } = stubbed(exited(5, "", ""));

    const result = await dispatcher.invoke("pause_project", { project_id: "p1" });

    expect(result).toEqual({
      ok: false,
      error: { kind: "RemoteError", message: "manus-mcp-cli exited with status 5", code: 5 }
    });
  });

  it("returns a DecodeError for non-JSON output with a zero exit", async () => {
    const { dispatcher } = stubbed(exited(0, "Connected to server\nall good"));

    const result = await dispatcher.invoke("get_project_url", { project_id: "p1" });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "DecodeError",
        message: "Command output is not valid JSON",
        code: 0,
        details: { raw_output: "Connected to server\nall good" }
      }
    });
  });

  it("passes numbers that overflow to Infinity through as decoded", async () => {
    const { dispatcher } = stubbed(exited(0, '{"n": 1e400}'));

    await expect(dispatcher.invoke("execute_sql", { project_id: "p1", query: "select 1" })).resolves.toEqual({
      ok: true,
      data: { n: Number.POSITIVE_INFINITY }
    });
  });

  it("keeps a __proto__ key in decoded output as an own property", async () => {
    const { dispatcher } = stubbed(exited(0, '{"__proto__": {"polluted": true}, "a": 1}'));

    const result = await dispatcher.invoke("get_project", { id: "p1" });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(JSON.stringify(result.data)).toBe('{"__proto__":{"polluted":true},"a":1}');
      expect(Object.keys(result.data ?? {})).toEqual(["__proto__", "a"]);
    }
  });

  it("treats empty output as undecodable", () => {
    const result = decodeJson("");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("DecodeError");
    }
  });

  it("maps a timeout to TimeoutError with code -1", async () => {
    const { dispatcher } = stubbed({ kind: "timed-out", stdout: "", stderr: "" });

    await expect(dispatcher.invoke("list_branches", { project_id: "p1" })).resolves.toEqual({
      ok: false,
      error: { kind: "TimeoutError", message: "Command timed out after 30 seconds", code: -1 }
    });
  });

  it("maps a missing executable to InvocationError with code -2", async () => {
    const runner = vi.fn(
      async (_request: ProcessRequest): Promise<ProcessOutcome> => ({
        kind: "spawn-failed",
        errorCode: "ENOENT",
        message: "spawn missing-cli ENOENT"
      })
    );
    const dispatcher = new CommandDispatcher({ executable: "missing-cli", runner });

    await expect(dispatcher.invoke("list_projects")).resolves.toEqual({
      ok: false,
      error: {
        kind: "InvocationError",
        message: 'Executable "missing-cli" was not found',
        code: -2,
        details: { executable: "missing-cli" }
      }
    });
  });

  it("maps other start failures to code -3", async () => {
    const { dispatcher } = stubbed({ kind: "spawn-failed", errorCode: "EACCES", message: "spawn EACCES" });

    const result = await dispatcher.invoke("list_projects");

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "InvocationError",
        message: 'Unable to start "manus-mcp-cli": spawn EACCES',
        code: -3,
        details: { executable: "manus-mcp-cli", errno: "EACCES" }
      }
    });
  });

  it("converts a runner rejection into an InvocationError", async () => {
    const runner = vi.fn(async (_request: ProcessRequest): Promise<ProcessOutcome> => {
      throw new Error("runner exploded");
    });
    const dispatcher = new CommandDispatcher({ runner });

    const result = await dispatcher.invoke("list_projects");

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "InvocationError",
        message: 'Unable to start "manus-mcp-cli": runner exploded',
        code: -3,
        details: { executable: "manus-mcp-cli" }
      }
    });
  });

  it("rejects invalid operation names without spawning", async () => {
    const { dispatcher, runner } = stubbed(exited(0, "{}"));

    const results = await Promise.all([
      dispatcher.invoke(""),
      dispatcher.invoke("list projects"),
      dispatcher.invoke("--help")
    ]);

    expect(runner).not.toHaveBeenCalled();
    for (const result of results) {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("InvocationError");
        expect(result.error.code).toBe(-4);
      }
    }
  });

  it("rejects non-finite numbers in arguments without spawning", async () => {
    const { dispatcher, runner } = stubbed(exited(0, "{}"));

    const result = await dispatcher.invoke("execute_sql", { project_id: "p1", limit: Number.NaN });

    expect(runner).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
  });

  it("forwards operations outside the catalog", async () => {
    const { dispatcher, runner } = stubbed(exited(0, '{"ok": true}'));

    const result = await dispatcher.invoke("future_operation");

    expect(result.ok).toBe(true);
    expect(runner.mock.calls[0][0].args[2]).toBe("future_operation");
  });

  it("gives structurally identical results for repeated calls", async () => {
    const { dispatcher, runner } = stubbed(exited(0, '{"tables": [{"name": "users"}]}'));

    const first = await dispatcher.invoke("list_tables", { project_id: "p1" });
    const second = await dispatcher.invoke("list_tables", { project_id: "p1" });

    expect(runner).toHaveBeenCalledTimes(2);
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("refuses timeouts that setTimeout cannot hold", () => {
    const runner = vi.fn(async (_request: ProcessRequest): Promise<ProcessOutcome> => exited(0, "{}"));

    expect(() => new CommandDispatcher({ timeoutMs: 3_000_000_000, runner })).toThrow(RangeError);
    expect(() => new CommandDispatcher({ timeoutMs: 0, runner })).toThrow(RangeError);
    expect(new CommandDispatcher({ timeoutMs: 2_147_483_647, runner }).timeoutMs).toBe(2_147_483_647);
  });

  it("lists tools from the connector's tool list output", async () => {
    const { dispatcher, runner } = stubbed(
      exited(0, "Available tools:\nTool: search_docs\n  Search docs\nTool: list_projects\n")
    );

    await expect(dispatcher.listTools()).resolves.toEqual({
      ok: true,
      data: ["search_docs", "list_projects"]
    });
    expect(runner.mock.calls[0][0].args).toEqual(["tool", "list", "--server", "supabase"]);
  });
});

describe("outcome normalization", () => {
  const context = { executable: "manus-mcp-cli", timeoutMs: 1_500 };

  it("reports fractional timeouts in seconds", () => {
    const result = normalizeOutcome({ kind: "timed-out", stdout: "", stderr: "" }, context, decodeJson);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Command timed out after 1.5 seconds");
    }
  });

  it("derives a code from the terminating signal", () => {
    const result = normalizeOutcome(
      { kind: "exited", status: null, signal: "SIGTERM", stdout: "", stderr: "" },
      context,
      decodeJson
    );
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "RemoteError",
        message: "manus-mcp-cli exited with status 143",
        code: 143,
        details: { signal: "SIGTERM" }
      }
    });
  });
});
