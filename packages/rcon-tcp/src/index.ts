// @rconsole/tcp - TCP transport for the RCON console (Node.js only)
//
// Socket framing, the dialer, server.properties loading and console entry
// points that put them together.

export { SocketFramed } from "./framing.ts";
export { dialTcp, parseAddress, type SocketAddress } from "./dial.ts";
export {
  PropertiesError,
  type PropertiesErrorKind,
  type RconProperties,
  parseProperties,
  rconProperties,
  readRconProperties,
} from "./properties.ts";
export { connectConsole, consoleFromProperties, type TcpConsoleConfig, type PropertiesConsoleOptions } from "./console.ts";

// Re-export the console surface from core for convenience
export {
  ServerConsole,
  type ConsoleConfig,
  ConnectionManager,
  ClientClosedError,
  type ConnectionState,
  type RunOptions,
  ClientError,
  type ClientErrorKind,
  type TickStats,
  commandLogger,
  type LoggingOptions,
  type CommandHook,
  RconError,
  type RconErrorKind,
} from "@rconsole/core";
