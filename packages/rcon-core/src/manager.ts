// Serialized access to one RCON connection.
//
// Any number of callers may run commands concurrently; the manager queues
// them in arrival order and lets exactly one exchange touch the socket at a
// time. The authenticated connection is opened lazily, kept warm between
// commands, and retired after any failure so that the next command starts
// from a fresh connect + authenticate.

import debug from "debug";
import { type Authenticated, Disconnected, type ConnectionOptions } from "./connection.ts";
import type { CommandCall, CommandHook, CommandOutcome } from "./hooks.ts";
import { commandLogger } from "./logging.ts";
import type { Dialer } from "./transport.ts";

const log = debug("rconsole:connection");

/** Connection state. */
export type ConnectionState = "disconnected" | "connecting" | "connected" | "authenticated";

/** Configuration for a connection manager. */
export interface ConnectionManagerConfig {
  /** Server address, "host:port". */
  address: string;

  /** Shared RCON password. Never logged. */
  password: string;

  /** Opens the underlying transport. */
  dial: Dialer;

  /**
   * Bound, in milliseconds, on each connect attempt and each frame read.
   * Default: none. A stalled server then stalls every queued command.
   */
  requestTimeout?: number;

  /** Observers run around every command. Default: [commandLogger()] */
  hooks?: CommandHook[];

  /** Called when connection state changes. */
  onStateChange?: (state: ConnectionState) => void;
}

export interface RunOptions {
  /** Half-close the connection after a successful response. */
  disconnectAfter?: boolean;
}

/** Error thrown when the manager is permanently closed. */
export class ClientClosedError extends Error {
  constructor() {
    super("Client is closed");
    this.name = "ClientClosedError";
  }
}

type Job = { kind: "connect" } | { kind: "command"; command: string; disconnectAfter: boolean };

interface PendingRequest {
  job: Job;
  resolve: (value: string) => void;
  reject: (error: Error) => void;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export class ConnectionManager {
  private readonly address: string;
  private readonly password: string;
  private readonly dial: Dialer;
  private readonly connectionOptions: ConnectionOptions;
  private readonly hooks: CommandHook[];
  private readonly onStateChange?: (state: ConnectionState) => void;

  private state: ConnectionState = "disconnected";
  private connection: Authenticated | null = null;
  private queue: PendingRequest[] = [];
  private draining = false;
  private closed = false;

  constructor(config: ConnectionManagerConfig) {
    this.address = config.address;
    this.password = config.password;
    this.dial = config.dial;
    this.connectionOptions = { timeoutMs: config.requestTimeout };
    this.hooks = config.hooks ?? [commandLogger()];
    this.onStateChange = config.onStateChange;
  }

  /** Get the current connection state. */
  getState(): ConnectionState {
    return this.state;
  }

  /** Check if the manager has been permanently closed. */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run a command and resolve with its full text response.
   *
   * Waits behind every command queued before it. A failure rejects this
   * call only and retires the connection; it is not retried.
   */
  run(command: string, options: RunOptions = {}): Promise<string> {
    return this.enqueue({
      kind: "command",
      command,
      disconnectAfter: options.disconnectAfter ?? false,
    });
  }

  /**
   * Establish the authenticated connection now instead of on the first
   * command. Queued like a command; resolves at once if already connected.
   */
  async connect(): Promise<void> {
    await this.enqueue({ kind: "connect" });
  }

  /**
   * Close the manager permanently.
   *
   * Queued commands fail with ClientClosedError. A command already on the
   * wire finishes first; the connection is then half-closed.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const pending = this.queue;
    this.queue = [];
    for (const request of pending) {
      request.reject(new ClientClosedError());
    }

    if (!this.draining) {
      this.retire("disconnect");
    }
  }

  private enqueue(job: Job): Promise<string> {
    if (this.closed) {
      return Promise.reject(new ClientClosedError());
    }
    return new Promise((resolve, reject) => {
      this.queue.push({ job, resolve, reject });
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      let request = this.queue.shift();
      while (request !== undefined) {
        try {
          request.resolve(await this.process(request.job));
        } catch (e) {
          request.reject(toError(e));
        }
        request = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private async process(job: Job): Promise<string> {
    if (job.kind === "connect") {
      await this.ensureConnection();
      if (this.closed) this.retire("disconnect");
      return "";
    }

    const call: CommandCall = { command: job.command, startedAt: performance.now() };
    this.runHooks((hook) => hook.pre?.(call));

    try {
      const connection = await this.ensureConnection();
      const value = await connection.command(job.command);
      if (job.disconnectAfter || this.closed) {
        this.retire("disconnect");
      }
      this.finish(call, { ok: true, value });
      return value;
    } catch (e) {
      const error = toError(e);
      this.retire("destroy");
      this.finish(call, { ok: false, error });
      throw error;
    }
  }

  private async ensureConnection(): Promise<Authenticated> {
    if (this.connection !== null) return this.connection;

    this.setState("connecting");
    try {
      const connected = await new Disconnected(this.connectionOptions).connect(
        this.address,
        this.dial,
      );
      this.setState("connected");
      const authenticated = await connected.authenticate(this.password);
      this.connection = authenticated;
      this.setState("authenticated");
      return authenticated;
    } catch (e) {
      this.setState("disconnected");
      throw e;
    }
  }

  /**
   * Drop the cached connection. Closing is best effort: the connection is
   * already known broken or no longer wanted, and a second failure here must
   * not hide the first one.
   */
  private retire(mode: "disconnect" | "destroy"): void {
    const connection = this.connection;
    this.connection = null;
    if (connection !== null) {
      try {
        if (mode === "disconnect") {
          connection.disconnect();
        } else {
          connection.destroy();
        }
      } catch (e) {
        log("ignoring failure while closing connection: %O", e);
      }
      log("connection retired (%s)", mode);
    }
    this.setState("disconnected");
  }

  private finish(call: CommandCall, outcome: CommandOutcome): void {
    this.runHooks((hook) => hook.post?.(call, outcome));
  }

  private runHooks(fn: (hook: CommandHook) => void): void {
    for (const hook of this.hooks) {
      try {
        fn(hook);
      } catch (e) {
        log("command hook failed: %O", e);
      }
    }
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.onStateChange?.(state);
    }
  }
}
