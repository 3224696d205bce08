// Typed server operations on top of the connection manager.

import { classifyError } from "./client_error.ts";
import {
  ConnectionManager,
  type ConnectionManagerConfig,
  type ConnectionState,
  type RunOptions,
} from "./manager.ts";
import { parsePlayerList, parseTickStats, type TickStats } from "./parsers.ts";

export type ConsoleConfig = ConnectionManagerConfig;

/**
 * Remote console for one game server.
 *
 * Every method is safe to call concurrently; commands reach the server one
 * at a time, in call order. Failures are ClientError (or ClientClosedError
 * after {@link ServerConsole.close}).
 */
export class ServerConsole {
  private readonly manager: ConnectionManager;

  constructor(config: ConsoleConfig) {
    this.manager = new ConnectionManager(config);
  }

  /** Create a console and connect and authenticate before returning it. */
  static async connect(config: ConsoleConfig): Promise<ServerConsole> {
    const rcon = new ServerConsole(config);
    await rcon.connect();
    return rcon;
  }

  async connect(): Promise<void> {
    try {
      await this.manager.connect();
    } catch (e) {
      throw classifyError(e);
    }
  }

  /** Run an arbitrary command and return the server's text response. */
  async run(command: string, options: RunOptions = {}): Promise<string> {
    try {
      return await this.manager.run(command, options);
    } catch (e) {
      throw classifyError(e);
    }
  }

  /** Flush world data to disk. */
  async saveAll(): Promise<void> {
    await this.run("save-all");
  }

  /** Shut the server down. The connection is closed afterwards. */
  async stop(): Promise<void> {
    await this.run("stop", { disconnectAfter: true });
  }

  /** Names of the players currently online. */
  async list(): Promise<string[]> {
    return parsePlayerList(await this.run("list"));
  }

  async queryTick(): Promise<TickStats> {
    return parseTickStats(await this.run("tick query"));
  }

  getState(): ConnectionState {
    return this.manager.getState();
  }

  close(): void {
    this.manager.close();
  }
}
