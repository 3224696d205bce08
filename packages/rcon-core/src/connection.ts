// Connection states.
//
// Disconnected → Connected → Authenticated, one class per state so that only
// the operations valid in a state exist on it: `command` cannot be called on
// a connection that has not authenticated.

import debug from "debug";
import {
  AUTH_FAILED_ID,
  AUTH_ID,
  MAX_PACKET_SIZE,
  PacketType,
  RconError,
  authenticationPacket,
  commandPacket,
  decodePayload,
  packetTypeName,
} from "@rconsole/wire";
import { readFragmented } from "./fragments.ts";
import { SequenceCounter } from "./sequence.ts";
import {
  recvPacket,
  recvRawPacket,
  sendPacket,
  type Dialer,
  type FrameTransport,
} from "./transport.ts";

const log = debug("rconsole:connection");

export interface ConnectionOptions {
  /** Bound on each connect attempt and each frame read, in milliseconds. */
  timeoutMs?: number;
}

/** No socket yet. */
export class Disconnected {
  readonly state = "disconnected" as const;

  constructor(private readonly options: ConnectionOptions = {}) {}

  async connect(address: string, dial: Dialer): Promise<Connected> {
    log("connecting to %s", address);
    let io: FrameTransport;
    try {
      io = await dial(address, { timeoutMs: this.options.timeoutMs });
    } catch (e) {
      throw e instanceof RconError ? e : RconError.connect(e);
    }
    log("connected to %s", address);
    return new Connected(io, this.options);
  }
}

/** Live socket, not yet authenticated. */
export class Connected {
  readonly state = "connected" as const;
  private io: FrameTransport | null;

  constructor(
    io: FrameTransport,
    private readonly options: ConnectionOptions = {},
  ) {
    this.io = io;
  }

  /**
   * Log in with the shared password.
   *
   * The server acknowledges with a command-typed packet: id 0 on success,
   * id -1 on a wrong password. The transport moves to the returned
   * Authenticated value; on failure it is destroyed. Either way this value
   * cannot be used again.
   */
  async authenticate(password: string): Promise<Authenticated> {
    const io = this.take();
    try {
      await sendPacket(io, authenticationPacket(AUTH_ID, password));
      const { packet } = await recvPacket(io, this.options.timeoutMs);

      if (packet.type !== PacketType.Command) {
        throw RconError.invalidPacketType(
          packetTypeName(PacketType.Command),
          packetTypeName(packet.type),
        );
      }
      if (packet.id === AUTH_FAILED_ID) {
        throw RconError.authFail();
      }
      if (packet.id !== AUTH_ID) {
        throw RconError.idMismatch(AUTH_ID, packet.id);
      }
    } catch (e) {
      io.destroy();
      throw e;
    }

    log("authenticated");
    return new Authenticated(io, new SequenceCounter(), this.options);
  }

  /** Drop the socket without authenticating. */
  destroy(): void {
    this.io?.destroy();
    this.io = null;
  }

  private take(): FrameTransport {
    const io = this.io;
    if (io === null) throw RconError.closed();
    this.io = null;
    return io;
  }
}

/** Live, authenticated socket with its own sequence counter. */
export class Authenticated {
  readonly state = "authenticated" as const;
  private io: FrameTransport | null;

  constructor(
    io: FrameTransport,
    private readonly sequence: SequenceCounter,
    private readonly options: ConnectionOptions = {},
  ) {
    this.io = io;
  }

  /** Whether the socket is still owned by this value. */
  isOpen(): boolean {
    return this.io !== null;
  }

  /**
   * Run one command and return its full text response, reassembled when the
   * server split it across frames.
   */
  async command(text: string): Promise<string> {
    const io = this.live();
    const id = this.sequence.next();
    await sendPacket(io, commandPacket(id, text));

    const { packet, size } = await recvRawPacket(io, this.options.timeoutMs);
    if (packet.id !== id) {
      throw RconError.idMismatch(id, packet.id);
    }
    if (packet.type !== PacketType.Response) {
      throw RconError.invalidPacketType(
        packetTypeName(PacketType.Response),
        packetTypeName(packet.type),
      );
    }

    if (size < MAX_PACKET_SIZE) {
      return decodePayload(packet.payload);
    }
    return readFragmented(io, packet.payload, id, this.sequence.next(), this.options.timeoutMs);
  }

  /** Half-close the socket. */
  disconnect(): void {
    const io = this.io;
    this.io = null;
    io?.close();
  }

  /** Close the socket immediately. */
  destroy(): void {
    const io = this.io;
    this.io = null;
    io?.destroy();
  }

  private live(): FrameTransport {
    if (this.io === null) throw RconError.closed();
    return this.io;
  }
}
