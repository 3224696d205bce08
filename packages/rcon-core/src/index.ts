// @rconsole/core - RCON connection states, serialized connection manager and
// console commands. Transport-agnostic; see @rconsole/tcp for sockets.

// Protocol errors and codec, for callers that inspect failures
export {
  RconError,
  type RconErrorKind,
  PacketType,
  type Packet,
  type RawPacket,
  encodePacket,
  decodePacket,
  decodeRawPacket,
  decodePayload,
} from "@rconsole/wire";

// Transport
export {
  type FrameTransport,
  type Dialer,
  type DialOptions,
  sendPacket,
  recvPacket,
  recvRawPacket,
} from "./transport.ts";

// Connection states
export {
  Disconnected,
  Connected,
  Authenticated,
  type ConnectionOptions,
} from "./connection.ts";
export { SequenceCounter } from "./sequence.ts";
export { readFragmented } from "./fragments.ts";

// Connection manager
export {
  ConnectionManager,
  ClientClosedError,
  type ConnectionManagerConfig,
  type ConnectionState,
  type RunOptions,
} from "./manager.ts";

// Hooks and logging
export type { CommandHook, CommandCall, CommandOutcome } from "./hooks.ts";
export { commandLogger, type LoggingOptions, type LogSink } from "./logging.ts";

// Console
export { ServerConsole, type ConsoleConfig } from "./console.ts";
export { ClientError, classifyError, type ClientErrorKind } from "./client_error.ts";
export { parsePlayerList, parseTickStats, type TickStats } from "./parsers.ts";
