import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

export interface ProcessRequest {
  executable: string;
  args: string[];
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export type ProcessOutcome =
  | {
      kind: "exited";
      status: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | { kind: "timed-out"; stdout: string; stderr: string }
  | { kind: "spawn-failed"; errorCode?: string; message: string };

export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessOutcome>;

export interface LaunchedProcess {
  stdout: Readable;
  stderr: Readable;
  on(event: "error", listener: (error: Error) => void): this;
  on(event: "close", listener: (status: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type Launcher = (
  executable: string,
  args: string[],
  options: { env?: NodeJS.ProcessEnv; signal: AbortSignal }
) => LaunchedProcess;

export const launchProcess: Launcher = (executable, args, options) =>
  spawn(executable, args, {
    env: options.env,
    signal: options.signal,
    stdio: ["ignore", "pipe", "pipe"],
    killSignal: "SIGKILL",
    windowsHide: true
  });

function errnoCode(error: unknown) {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function createProcessRunner(launch: Launcher = launchProcess): ProcessRunner {
  return (request) =>
    new Promise<ProcessOutcome>((resolve) => {
      const controller = new AbortController();
      const stdout: string[] = [];
      const stderr: string[] = [];
      let settled = false;

      const settle = (outcome: ProcessOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        resolve(outcome);
      };

      const timeout = setTimeout(() => {
        settle({ kind: "timed-out", stdout: stdout.join(""), stderr: stderr.join("") });
        controller.abort();
      }, request.timeoutMs);

      let child: LaunchedProcess;
      try {
        child = launch(request.executable, request.args, {
          env: request.env,
          signal: controller.signal
        });
      } catch (error) {
        settle({
          kind: "spawn-failed",
          errorCode: errnoCode(error),
          message: error instanceof Error ? error.message : String(error)
        });
        return;
      }

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => stdout.push(chunk));
      child.stderr.on("data", (chunk: string) => stderr.push(chunk));

      // spawn reports the abort synchronously as an AbortError.
      child.on("error", (error) => {
        if (controller.signal.aborted) {
          return;
        }
        settle({ kind: "spawn-failed", errorCode: errnoCode(error), message: error.message });
      });

      child.on("close", (status, signal) => {
        settle({
          kind: "exited",
          status,
          signal,
          stdout: stdout.join(""),
          stderr: stderr.join("")
        });
      });
    });
}

export const spawnProcess = createProcessRunner();
