// Reassembly of responses split across several frames.
//
// The protocol has no continuation flag. A response that fills a frame to
// MAX_PACKET_SIZE may continue, so the client sends an empty response-typed
// probe with a fresh id. The server answers the probe only after it has sent
// every remaining fragment, which makes the probe's reply the end marker.

import debug from "debug";
import {
  FRAGMENT_END_SENTINEL,
  PacketType,
  RconError,
  decodePayload,
  packetTypeName,
  probePacket,
} from "@rconsole/wire";
import { recvRawPacket, sendPacket, type FrameTransport } from "./transport.ts";

const log = debug("rconsole:connection");

const sentinelBytes = new TextEncoder().encode(FRAGMENT_END_SENTINEL);
const lenientDecoder = new TextDecoder();

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

function concat(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Drain continuation frames for `commandId` until the probe's reply arrives.
 *
 * Payloads are joined as bytes and decoded once: the server splits on byte
 * count, so a multi-byte character may straddle two frames.
 *
 * @param first - Payload bytes of the full-size frame that started the response
 * @returns The concatenated payloads, in receipt order
 */
export async function readFragmented(
  io: FrameTransport,
  first: Uint8Array,
  commandId: number,
  probeId: number,
  timeoutMs?: number,
): Promise<string> {
  await sendPacket(io, probePacket(probeId));
  log("response %d is fragmented, probing with %d", commandId, probeId);

  const parts = [first];
  while (true) {
    const { packet } = await recvRawPacket(io, timeoutMs);

    if (packet.id === commandId) {
      parts.push(packet.payload);
      continue;
    }

    if (packet.id !== probeId) {
      throw RconError.idMismatch(probeId, packet.id);
    }

    if (packet.type === PacketType.Response && sameBytes(packet.payload, sentinelBytes)) {
      log("response %d reassembled from %d frames", commandId, parts.length);
      return decodePayload(concat(parts));
    }

    throw RconError.invalidPacketType(
      `${packetTypeName(PacketType.Response)} "${FRAGMENT_END_SENTINEL}"`,
      `${packetTypeName(packet.type)} "${lenientDecoder.decode(packet.payload)}"`,
    );
  }
}
