// In-process RCON server stand-in for tests.
//
// Each dial produces a StubTransport that parses what the client writes and
// answers the way a vanilla server does: auth acknowledgements as
// command-typed packets, long responses split into full-size frames, and the
// "Unknown request 0" reply to the fragmentation probe.

import {
  FRAGMENT_END_SENTINEL,
  MAX_PACKET_SIZE,
  MIN_PACKET_SIZE,
  PacketType,
  RconError,
} from "@rconsole/wire";
import type { Dialer, FrameTransport } from "./transport.ts";

/** Payload bytes that fill a frame to MAX_PACKET_SIZE. */
export const FRAGMENT_PAYLOAD_SIZE = MAX_PACKET_SIZE - MIN_PACKET_SIZE;

export interface SentPacket {
  id: number;
  type: number;
  payload: string;
}

/**
 * Build a frame body the way a server would, without client-side limits.
 * A byte payload is copied as is, so it may split a character.
 */
export function frameBody(id: number, type: number, payload: string | Uint8Array): Uint8Array {
  const bytes = typeof payload === "string" ? new TextEncoder().encode(payload) : payload;
  const body = new Uint8Array(8 + bytes.length + 2);
  const view = new DataView(body.buffer);
  view.setInt32(0, id, true);
  view.setInt32(4, type, true);
  body.set(bytes, 8);
  return body;
}

function parseSent(frame: Uint8Array): SentPacket {
  const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
  return {
    id: view.getInt32(4, true),
    type: view.getInt32(8, true),
    payload: new TextDecoder().decode(frame.subarray(12, frame.length - 2)),
  };
}

function describeBody(body: Uint8Array): string {
  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const payload = new TextDecoder().decode(body.subarray(8, body.length - 2));
  return `${view.getInt32(0, true)}:${payload}`;
}

/** Split an ASCII response into frames the way the server does. */
export function fragmentResponse(id: number, text: string): Uint8Array[] {
  const frames: Uint8Array[] = [];
  for (let i = 0; i < text.length; i += FRAGMENT_PAYLOAD_SIZE) {
    frames.push(frameBody(id, PacketType.Response, text.slice(i, i + FRAGMENT_PAYLOAD_SIZE)));
  }
  if (frames.length === 0) {
    frames.push(frameBody(id, PacketType.Response, ""));
  }
  return frames;
}

/**
 * Overrides the default answer to a packet. Return undefined to fall back to
 * the default, or an empty array to stay silent.
 */
export type Script = (packet: SentPacket) => Uint8Array[] | undefined;

export class StubServer {
  password = "test-secret";
  /** Milliseconds before replies are delivered. */
  delayMs = 0;
  /** Make every dial fail. */
  refuse = false;
  respond: (command: string) => string = (command) => `ran ${command}`;
  script: Script | undefined;

  /** Frames in the order they crossed the wire: "→ id:payload" / "← id:payload". */
  readonly wire: string[] = [];
  readonly transports: StubTransport[] = [];

  readonly dial: Dialer = async () => {
    if (this.refuse) {
      throw new Error("connect ECONNREFUSED");
    }
    const transport = new StubTransport(this);
    this.transports.push(transport);
    return transport;
  };

  get dials(): number {
    return this.transports.length;
  }

  /** The most recently dialed transport. */
  latest(): StubTransport {
    const transport = this.transports[this.transports.length - 1];
    if (transport === undefined) throw new Error("nothing dialed yet");
    return transport;
  }

  handle(packet: SentPacket): Uint8Array[] {
    const scripted = this.script?.(packet);
    if (scripted !== undefined) return scripted;

    switch (packet.type) {
      case PacketType.Authentication: {
        const id = packet.payload === this.password ? packet.id : -1;
        return [frameBody(id, PacketType.Command, "")];
      }
      case PacketType.Command:
        return fragmentResponse(packet.id, this.respond(packet.payload));
      default:
        return [frameBody(packet.id, PacketType.Response, FRAGMENT_END_SENTINEL)];
    }
  }
}

export class StubTransport implements FrameTransport {
  readonly sent: SentPacket[] = [];
  closed = false;
  destroyed = false;

  private inbox: Uint8Array[] = [];
  private waiter: { resolve: (body: Uint8Array) => void; reject: (error: Error) => void } | null =
    null;
  private failure: RconError | null = null;

  constructor(private readonly server: StubServer) {}

  async send(frame: Uint8Array): Promise<void> {
    if (this.failure !== null) {
      throw RconError.write(new Error("connection reset by peer"));
    }
    const packet = parseSent(frame);
    this.sent.push(packet);
    this.server.wire.push(`→ ${packet.id}:${packet.payload}`);

    const replies = this.server.handle(packet);
    setTimeout(() => {
      for (const body of replies) this.deliver(body);
    }, this.server.delayMs);
  }

  recvFrame(timeoutMs?: number): Promise<Uint8Array> {
    const body = this.inbox.shift();
    if (body !== undefined) return Promise.resolve(body);
    if (this.failure !== null) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      const timer =
        timeoutMs === undefined
          ? null
          : setTimeout(() => {
              this.waiter = null;
              reject(RconError.read(new Error(`timed out after ${timeoutMs} ms`)));
            }, timeoutMs);
      const clear = () => {
        if (timer !== null) clearTimeout(timer);
        this.waiter = null;
      };
      this.waiter = {
        resolve: (frame) => {
          clear();
          resolve(frame);
        },
        reject: (error) => {
          clear();
          reject(error);
        },
      };
    });
  }

  /** Hand a frame body to the client. */
  deliver(body: Uint8Array): void {
    if (this.destroyed) return;
    this.server.wire.push(`← ${describeBody(body)}`);
    if (this.waiter !== null) {
      this.waiter.resolve(body);
    } else {
      this.inbox.push(body);
    }
  }

  /** Simulate the server dropping the connection. */
  breakConnection(): void {
    this.fail(RconError.read(new Error("connection reset by peer")));
  }

  close(): void {
    this.closed = true;
  }

  destroy(): void {
    this.destroyed = true;
    this.fail(RconError.read(new Error("connection destroyed")));
  }

  private fail(error: RconError): void {
    if (this.failure === null) this.failure = error;
    this.waiter?.reject(this.failure);
  }
}
