// Command logging hook with timing information.
//
// Switched on through the `debug` package's DEBUG environment variable:
//
//   DEBUG=rconsole:*          all console logging
//   DEBUG=rconsole:command    only command request/response lines

import debug from "debug";
import { RconError } from "@rconsole/wire";
import type { CommandCall, CommandHook, CommandOutcome } from "./hooks.ts";

/** Receives one formatted line plus a structured object. */
export type LogSink = (message: string, data: Record<string, unknown>) => void;

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "rconsole:command".
   */
  namespace?: string;

  /**
   * Log response text. Defaults to false; responses can be long.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log a response. Faster exchanges are skipped.
   * Defaults to 0.
   */
  minDuration?: number;

  /**
   * Where lines go instead of the debug logger. Always enabled when given.
   */
  sink?: LogSink;
}

function debugSink(namespace: string): LogSink {
  const logger = debug(namespace);
  return (message, data) => {
    if (logger.enabled) logger("%s %O", message, data);
  };
}

/**
 * Create a hook that logs every command with its duration.
 *
 * @example
 * ```typescript
 * const rcon = new ServerConsole({
 *   address: "127.0.0.1:25575",
 *   password: process.env.RCON_PASSWORD ?? "",
 *   dial: dialTcp,
 *   hooks: [commandLogger({ minDuration: 50 })],
 * });
 * ```
 */
export function commandLogger(options: LoggingOptions = {}): CommandHook {
  const sink = options.sink ?? debugSink(options.namespace ?? "rconsole:command");
  const logResults = options.logResults ?? false;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(call: CommandCall): void {
      sink(`→ ${call.command}`, { type: "request", command: call.command });
    },

    post(call: CommandCall, outcome: CommandOutcome): void {
      const duration = performance.now() - call.startedAt;
      if (duration < minDuration) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        command: call.command,
        duration: `${duration.toFixed(2)}ms`,
        ok: outcome.ok,
      };

      if (outcome.ok) {
        if (logResults) logObj.result = outcome.value;
        sink(`← ${call.command}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      const error = outcome.error;
      logObj.error =
        error instanceof RconError
          ? { kind: error.kind, message: error.message }
          : { name: error.name, message: error.message };
      sink(`← ${call.command}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
