// TCP dialer for RCON connections.

import net from "node:net";
import debug from "debug";
import type { DialOptions, FrameTransport } from "@rconsole/core";
import { RconError } from "@rconsole/wire";
import { SocketFramed } from "./framing.ts";

const log = debug("rconsole:connection");

export interface SocketAddress {
  host: string;
  port: number;
}

/**
 * Split "host:port". IPv6 hosts go in brackets: "[::1]:25575".
 */
export function parseAddress(address: string): SocketAddress {
  let host: string;
  let portText: string;

  if (address.startsWith("[")) {
    const close = address.indexOf("]:");
    if (close < 0) throw new Error(`Invalid address: ${address}`);
    host = address.slice(1, close);
    portText = address.slice(close + 2);
  } else {
    const lastColon = address.lastIndexOf(":");
    if (lastColon < 0) throw new Error(`Invalid address: ${address}`);
    host = address.slice(0, lastColon);
    portText = address.slice(lastColon + 1);
  }

  const port = /^\d+$/.test(portText) ? Number(portText) : NaN;
  if (host.length === 0 || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid address: ${address}`);
  }
  return { host, port };
}

/**
 * Open a TCP connection to `address`. Resolves once connected; every
 * failure, including a bad address or `timeoutMs` elapsing, is a `connect`
 * error.
 */
export function dialTcp(address: string, options: DialOptions = {}): Promise<FrameTransport> {
  return new Promise((resolve, reject) => {
    let target: SocketAddress;
    try {
      target = parseAddress(address);
    } catch (e) {
      reject(RconError.connect(e));
      return;
    }

    const socket = net.createConnection({ host: target.host, port: target.port });

    const onError = (err: Error) => {
      socket.destroy();
      reject(RconError.connect(err));
    };
    const onTimeout = () => {
      socket.destroy();
      reject(RconError.connect(new Error(`timed out after ${options.timeoutMs} ms`)));
    };

    socket.once("error", onError);
    if (options.timeoutMs !== undefined) {
      socket.setTimeout(options.timeoutMs);
      socket.once("timeout", onTimeout);
    }

    socket.once("connect", () => {
      socket.off("error", onError);
      socket.off("timeout", onTimeout);
      socket.setTimeout(0);
      socket.setNoDelay(true);
      log("socket open to %s:%d", target.host, target.port);
      resolve(new SocketFramed(socket));
    });
  });
}
