import { constants } from "node:os";
import {
  EXIT_SENTINELS,
  JsonObjectSchema,
  OperationNameSchema,
  RemoteFailureSchema,
  isJsonValue,
  type DispatchError,
  type DispatchErrorKind,
  type DispatchResult,
  type JsonObject,
  type JsonValue
} from "@supabase-mcp/shared-types";
import { spawnProcess, type ProcessOutcome, type ProcessRunner } from "./process.js";

export const DEFAULT_EXECUTABLE = "manus-mcp-cli";
export const DEFAULT_SERVER_NAME = "supabase";
export const DEFAULT_TIMEOUT_MS = 30_000;
/** Largest delay `setTimeout` honours; anything above fires after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function isValidTimeoutMs(timeoutMs: number) {
  return Number.isFinite(timeoutMs) && timeoutMs > 0 && timeoutMs <= MAX_TIMEOUT_MS;
}

export interface DispatcherOptions {
  executable?: string;
  serverName?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
}

interface OutcomeContext {
  executable: string;
  timeoutMs: number;
}

export function failure(
  kind: DispatchErrorKind,
  message: string,
  code: number,
  details?: JsonObject
): { ok: false; error: DispatchError } {
  return {
    ok: false,
    error: details ? { kind, message, code, details } : { kind, message, code }
  };
}

function parseJson(text: string): JsonValue | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isJsonValue(parsed) ? parsed : undefined;
}

function remoteFailureMessage(text: string) {
  const trimmed = text.trim();
  if (!trimmed) {
    return undefined;
  }
  const parsed = RemoteFailureSchema.safeParse(parseJson(trimmed));
  return parsed.success ? parsed.data : undefined;
}

function exitCodeFor(status: number | null, signal: NodeJS.Signals | null) {
  if (status !== null) {
    return status;
  }
  const signalNumber = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return signalNumber !== undefined ? 128 + signalNumber : 1;
}

export function decodeJson(stdout: string): DispatchResult {
  const data = parseJson(stdout);
  if (data === undefined) {
    return failure("DecodeError", "Command output is not valid JSON", EXIT_SENTINELS.decodeFailed, {
      raw_output: stdout
    });
  }
  return { ok: true, data };
}

export function normalizeOutcome<T>(
  outcome: ProcessOutcome,
  context: OutcomeContext,
  decode: (stdout: string) => DispatchResult<T>
): DispatchResult<T> {
  if (outcome.kind === "spawn-failed") {
    if (outcome.errorCode === "ENOENT") {
      return failure(
        "InvocationError",
        `Executable "${context.executable}" was not found`,
        EXIT_SENTINELS.executableNotFound,
        { executable: context.executable }
      );
    }
    return failure(
      "InvocationError",
      `Unable to start "${context.executable}": ${outcome.message}`,
      EXIT_SENTINELS.startFailed,
      outcome.errorCode
        ? { executable: context.executable, errno: outcome.errorCode }
        : { executable: context.executable }
    );
  }

  if (outcome.kind === "timed-out") {
    return failure(
      "TimeoutError",
      `Command timed out after ${context.timeoutMs / 1000} seconds`,
      EXIT_SENTINELS.timeout
    );
  }

  const code = exitCodeFor(outcome.status, outcome.signal);
  if (code === 0) {
    return decode(outcome.stdout);
  }

  const reported = remoteFailureMessage(outcome.stdout) ?? remoteFailureMessage(outcome.stderr);
  const stderr = outcome.stderr.trim();
  const message =
    reported?.error ??
    (stderr ||
      outcome.stdout.trim() ||
      `${context.executable} exited with status ${code}`);

  const details: JsonObject = {};
  if (stderr) {
    details.stderr = outcome.stderr;
  }
  if (reported?.returncode !== undefined) {
    details.returncode = reported.returncode;
  }
  if (outcome.signal) {
    details.signal = outcome.signal;
  }

  return failure("RemoteError", message, code, Object.keys(details).length > 0 ? details : undefined);
}

export function parseToolList(stdout: string): DispatchResult<string[]> {
  const tools = stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("Tool: "))
    .map((line) => line.slice("Tool: ".length).trim())
    .filter(Boolean);
  return { ok: true, data: tools };
}

export class CommandDispatcher {
  readonly executable: string;
  readonly serverName: string;
  readonly timeoutMs: number;
  private readonly env?: NodeJS.ProcessEnv;
  private readonly runner: ProcessRunner;

  constructor(options: DispatcherOptions = {}) {
    this.executable = options.executable ?? DEFAULT_EXECUTABLE;
    this.serverName = options.serverName ?? DEFAULT_SERVER_NAME;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!isValidTimeoutMs(this.timeoutMs)) {
      throw new RangeError(`timeoutMs must be between 1 and ${MAX_TIMEOUT_MS}, got ${this.timeoutMs}`);
    }
    this.env = options.env;
    this.runner = options.runner ?? spawnProcess;
  }

  callArguments(operation: string, args: JsonObject) {
    return ["tool", "call", operation, "--server", this.serverName, "--input", JSON.stringify(args)];
  }

  listArguments() {
    return ["tool", "list", "--server", this.serverName];
  }

  async invoke(operation: string, args: JsonObject = {}): Promise<DispatchResult> {
    const name = OperationNameSchema.safeParse(operation);
    if (!name.success) {
      return failure(
        "InvocationError",
        `Invalid operation name "${operation}"`,
        EXIT_SENTINELS.invalidRequest
      );
    }

    const payload = JsonObjectSchema.safeParse(args);
    if (!payload.success) {
      return failure(
        "InvocationError",
        "Arguments must be an object of JSON-serializable values",
        EXIT_SENTINELS.invalidRequest
      );
    }

    return this.run(this.callArguments(name.data, args), decodeJson);
  }

  listTools(): Promise<DispatchResult<string[]>> {
    return this.run(this.listArguments(), parseToolList);
  }

  private async run<T>(args: string[], decode: (stdout: string) => DispatchResult<T>) {
    const context = { executable: this.executable, timeoutMs: this.timeoutMs };
    let outcome: ProcessOutcome;
    try {
      outcome = await this.runner({
        executable: this.executable,
        args,
        timeoutMs: this.timeoutMs,
        env: this.env
      });
    } catch (error) {
      outcome = {
        kind: "spawn-failed",
        message: error instanceof Error ? error.message : String(error)
      };
    }
    return normalizeOutcome(outcome, context, decode);
  }
}
