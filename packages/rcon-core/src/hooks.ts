// Observers around each command exchange.
//
// Hooks see every command the connection manager runs, in order. They can
// observe but not alter the exchange: an exception thrown by a hook is logged
// and otherwise ignored.

/** A command as it enters the exchange. */
export interface CommandCall {
  readonly command: string;
  /** `performance.now()` when the exchange started. */
  readonly startedAt: number;
}

export type CommandOutcome = { ok: true; value: string } | { ok: false; error: Error };

export interface CommandHook {
  /** Called right before the command is sent (and before any reconnect). */
  pre?(call: CommandCall): void;

  /** Called once the exchange finished, successfully or not. */
  post?(call: CommandCall, outcome: CommandOutcome): void;
}
