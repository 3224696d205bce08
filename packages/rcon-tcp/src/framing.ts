// Size-prefixed framing for RCON over a byte stream.
//
// Every packet starts with a 4-byte little-endian size counting the bytes
// that follow it. The prefix is validated as soon as it arrives, so a
// garbage size fails the read without waiting for a body that never comes.

import type { Duplex } from "node:stream";
import debug from "debug";
import type { FrameTransport } from "@rconsole/core";
import { RconError, readFrameSize } from "@rconsole/wire";

const log = debug("rconsole:connection");

const SIZE_PREFIX = 4;

interface Waiter {
  resolve: (body: Uint8Array) => void;
  reject: (error: RconError) => void;
}

/**
 * RCON frames over a Node.js stream (a `net.Socket` in production).
 *
 * Implements FrameTransport for use with the connection states.
 */
export class SocketFramed implements FrameTransport {
  private buf: Buffer = Buffer.alloc(0);
  private pendingFrames: Uint8Array[] = [];
  private waiter: Waiter | null = null;
  private failure: RconError | null = null;

  constructor(private readonly socket: Duplex) {
    socket.on("data", (chunk: Buffer) => {
      this.buf = Buffer.concat([this.buf, chunk]);
      this.processBuffer();
    });

    socket.on("error", (err: Error) => {
      this.fail(RconError.read(err));
    });

    socket.on("end", () => {
      this.fail(RconError.read(new Error("connection closed by the server")));
    });

    socket.on("close", () => {
      this.fail(RconError.read(new Error("connection closed")));
    });
  }

  private processBuffer(): void {
    while (this.failure === null && this.buf.length >= SIZE_PREFIX) {
      let size: number;
      try {
        size = readFrameSize(this.buf.subarray(0, SIZE_PREFIX));
      } catch (e) {
        this.fail(e instanceof RconError ? e : RconError.read(e));
        this.socket.destroy();
        return;
      }

      const needed = SIZE_PREFIX + size;
      if (this.buf.length < needed) break;

      const body = new Uint8Array(this.buf.subarray(SIZE_PREFIX, needed));
      this.buf = this.buf.subarray(needed);

      if (this.waiter !== null) {
        this.waiter.resolve(body);
      } else {
        this.pendingFrames.push(body);
      }
    }
  }

  /** Get the underlying stream. */
  getSocket(): Duplex {
    return this.socket;
  }

  /** Write one encoded packet and resolve once the stream accepted it. */
  send(frame: Uint8Array): Promise<void> {
    if (this.failure !== null || this.socket.writableEnded) {
      return Promise.reject(RconError.write(new Error("connection is closed")));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(frame, (err) => {
        if (err) reject(RconError.write(err));
        else resolve();
      });
    });
  }

  /**
   * Receive the next frame body. Frames that arrived earlier are returned
   * first, even after the connection failed.
   */
  recvFrame(timeoutMs?: number): Promise<Uint8Array> {
    const queued = this.pendingFrames.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.failure !== null) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      const timer =
        timeoutMs === undefined
          ? null
          : setTimeout(() => {
              this.waiter = null;
              reject(RconError.read(new Error(`timed out after ${timeoutMs} ms`)));
            }, timeoutMs);

      this.waiter = {
        resolve: (body) => {
          if (timer !== null) clearTimeout(timer);
          this.waiter = null;
          resolve(body);
        },
        reject: (error) => {
          if (timer !== null) clearTimeout(timer);
          this.waiter = null;
          reject(error);
        },
      };
    });
  }

  /** Half-close: no more writes, the server sees end of stream. */
  close(): void {
    log("half-closing socket");
    this.socket.end();
  }

  destroy(): void {
    log("destroying socket");
    this.fail(RconError.read(new Error("connection destroyed")));
    this.socket.destroy();
  }

  private fail(error: RconError): void {
    if (this.failure === null) {
      this.failure = error;
    }
    this.waiter?.reject(this.failure);
  }
}
