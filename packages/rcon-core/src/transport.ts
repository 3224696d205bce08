/**
 * Frame transport abstraction.
 *
 * The connection states speak RCON packets; a FrameTransport moves the raw
 * frames. Implementations:
 * - SocketFramed (@rconsole/tcp) over a Node.js socket
 * - in-process stand-ins in tests
 */

import {
  RconError,
  decodePacket,
  decodeRawPacket,
  encodePacket,
  type Packet,
  type RawPacket,
  type ReceivedPacket,
} from "@rconsole/wire";

export interface FrameTransport {
  /** Write one encoded packet, size prefix included. */
  send(frame: Uint8Array): Promise<void>;

  /**
   * Receive the next frame body (the bytes after the size prefix).
   *
   * The size prefix has already been validated. Rejects with a `read` error
   * when the connection fails or `timeoutMs` elapses first.
   */
  recvFrame(timeoutMs?: number): Promise<Uint8Array>;

  /** Half-close: stop writing and let the peer finish. */
  close(): void;

  /** Tear the connection down immediately; a pending receive fails. */
  destroy(): void;
}

export interface DialOptions {
  /** Give up connecting after this many milliseconds. */
  timeoutMs?: number;
}

/** Opens a transport to `address` ("host:port"). Failures are `connect` errors. */
export type Dialer = (address: string, options: DialOptions) => Promise<FrameTransport>;

export async function sendPacket(io: FrameTransport, packet: Packet): Promise<void> {
  const frame = encodePacket(packet);
  try {
    await io.send(frame);
  } catch (e) {
    throw e instanceof RconError ? e : RconError.write(e);
  }
}

async function recvBody(io: FrameTransport, timeoutMs?: number): Promise<Uint8Array> {
  try {
    return await io.recvFrame(timeoutMs);
  } catch (e) {
    throw e instanceof RconError ? e : RconError.read(e);
  }
}

export async function recvPacket(io: FrameTransport, timeoutMs?: number): Promise<ReceivedPacket> {
  const body = await recvBody(io, timeoutMs);
  return { packet: decodePacket(body), size: body.length };
}

/** Like {@link recvPacket}, leaving the payload as bytes. */
export async function recvRawPacket(
  io: FrameTransport,
  timeoutMs?: number,
): Promise<ReceivedPacket<RawPacket>> {
  const body = await recvBody(io, timeoutMs);
  return { packet: decodeRawPacket(body), size: body.length };
}
