// Caller-facing error classification.

import { RconError } from "@rconsole/wire";

export type ClientErrorKind =
  | "connect"
  | "authenticate"
  | "command"
  | "broken-connection"
  | "tick-stats";

/**
 * Error surfaced by the console operations.
 *
 * `broken-connection` means the socket failed mid-exchange; the connection
 * has been discarded and re-running the operation reconnects.
 */
export class ClientError extends Error {
  /** Unparsed server response, for `tick-stats` errors. */
  readonly raw?: string;

  constructor(
    public readonly kind: ClientErrorKind,
    message: string,
    options: { cause?: unknown; raw?: string } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ClientError";
    this.raw = options.raw;
  }

  /** Whether re-running the operation may succeed on a fresh connection. */
  isRetryable(): boolean {
    return this.kind === "broken-connection";
  }

  static fromRcon(error: RconError): ClientError {
    if (error.isConnectionBreaking()) {
      return new ClientError("broken-connection", `Lost server connection: ${error.message}`, {
        cause: error,
      });
    }
    switch (error.kind) {
      case "connect":
        return new ClientError("connect", error.message, { cause: error });
      case "auth-fail":
        return new ClientError("authenticate", error.message, { cause: error });
      default:
        return new ClientError("command", `Failed to execute the command: ${error.message}`, {
          cause: error,
        });
    }
  }

  static tickStats(raw: string): ClientError {
    return new ClientError("tick-stats", `Failed to parse server tick stats: ${raw}`, { raw });
  }
}

/** Map protocol errors to ClientError; anything else passes through. */
export function classifyError(error: unknown): unknown {
  return error instanceof RconError ? ClientError.fromRcon(error) : error;
}
