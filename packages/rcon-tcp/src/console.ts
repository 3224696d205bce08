// Console entry points wired to the TCP dialer.

import { ServerConsole, type ConsoleConfig, type Dialer } from "@rconsole/core";
import { dialTcp } from "./dial.ts";
import { PropertiesError, readRconProperties } from "./properties.ts";

/** Console options with the dialer made optional; it defaults to {@link dialTcp}. */
export type TcpConsoleConfig = Omit<ConsoleConfig, "dial"> & { dial?: Dialer };

export interface PropertiesConsoleOptions extends Omit<TcpConsoleConfig, "address" | "password"> {
  /** Host the server listens on. Default: "127.0.0.1" */
  host?: string;
}

/**
 * Create a console for a server reachable over TCP. Nothing is dialed until
 * the first command (or `connect()`).
 *
 * @example
 * ```typescript
 * const rcon = connectConsole({ address: "127.0.0.1:25575", password: "test-secret" });
 * console.log(await rcon.list());
 * rcon.close();
 * ```
 */
export function connectConsole(config: TcpConsoleConfig): ServerConsole {
  return new ServerConsole({ ...config, dial: config.dial ?? dialTcp });
}

/** Create a console from the RCON settings of a local server.properties. */
export async function consoleFromProperties(
  path: string,
  options: PropertiesConsoleOptions = {},
): Promise<ServerConsole> {
  const properties = await readRconProperties(path);
  if (!properties.enabled) {
    throw PropertiesError.rconDisabled();
  }

  const { host = "127.0.0.1", ...rest } = options;
  const address = host.includes(":") ? `[${host}]:${properties.port}` : `${host}:${properties.port}`;
  return connectConsole({ ...rest, address, password: properties.password });
}
