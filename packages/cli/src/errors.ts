import type { DispatchError } from "@supabase-mcp/shared-types";

export class CliError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, exitCode = 1, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }
}

export function errorEnvelope(code: string, message: string, details?: Record<string, unknown>) {
  return {
    ok: false as const,
    error: {
      code,
      message,
      details
    }
  };
}

export function isAuthenticationFailure(message: string) {
  return message.includes("Unauthorized") || message.includes("access token");
}

export function fromDispatchError(error: DispatchError) {
  const details = { kind: error.kind, returncode: error.code, ...error.details };

  switch (error.kind) {
    case "RemoteError":
      return isAuthenticationFailure(error.message)
        ? new CliError("UNAUTHORIZED", error.message, 4, details)
        : new CliError("REMOTE_ERROR", error.message, 1, details);
    case "TimeoutError":
      return new CliError("TIMEOUT", error.message, 2, details);
    case "DecodeError":
      return new CliError("INVALID_RESPONSE", error.message, 2, details);
    case "InvocationError":
      return new CliError("INVOCATION_ERROR", error.message, 3, details);
  }
}
