// Packet encoding and decoding. Pure functions, no I/O.

import { RconError } from "./rcon_error.ts";
import {
  MAX_CLIENT_PAYLOAD_SIZE,
  MAX_PACKET_SIZE,
  MIN_PACKET_SIZE,
  PACKET_PAD_SIZE,
  PacketType,
  type Packet,
  type RawPacket,
} from "./types.ts";

const INT32_MAX = 0x7fff_ffff;
const HEADER_SIZE = 8;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Encode a packet, size prefix included.
 *
 * Throws `invalid-id` for a negative id and `payload-too-big` when the UTF-8
 * payload exceeds {@link MAX_CLIENT_PAYLOAD_SIZE}.
 */
export function encodePacket(packet: Packet): Uint8Array {
  if (!Number.isInteger(packet.id) || packet.id < 0 || packet.id > INT32_MAX) {
    throw RconError.invalidId(packet.id);
  }

  const payload = textEncoder.encode(packet.payload);
  if (payload.length > MAX_CLIENT_PAYLOAD_SIZE) {
    throw RconError.payloadTooBig(MAX_CLIENT_PAYLOAD_SIZE, payload.length);
  }

  const size = HEADER_SIZE + payload.length + PACKET_PAD_SIZE;
  const out = new Uint8Array(4 + size);
  const view = new DataView(out.buffer);
  view.setInt32(0, size, true);
  view.setInt32(4, packet.id, true);
  view.setInt32(8, packet.type, true);
  out.set(payload, 4 + HEADER_SIZE);
  // Trailing pad bytes are already zero.
  return out;
}

/**
 * Validate a 4-byte size prefix and return the number of bytes that follow it.
 */
export function readFrameSize(prefix: Uint8Array): number {
  if (prefix.length !== 4) {
    throw RconError.decode(`A size prefix is 4 bytes long, got: ${prefix.length}`);
  }

  const view = new DataView(prefix.buffer, prefix.byteOffset, prefix.byteLength);
  const size = view.getInt32(0, true);
  if (size < MIN_PACKET_SIZE || size > MAX_PACKET_SIZE) {
    throw RconError.decode(
      `A packet size must be between ${MIN_PACKET_SIZE} and ${MAX_PACKET_SIZE} bytes long, server sent: ${size}`,
    );
  }
  return size;
}

/** Map a received type tag. Servers only ever send responses and auth acknowledgements. */
export function packetTypeFromWire(value: number): PacketType {
  switch (value) {
    case PacketType.Response:
      return PacketType.Response;
    case PacketType.Command:
      return PacketType.Command;
    default:
      throw RconError.decode(`Expected message type to be 0 or 2, got: ${value}`);
  }
}

/**
 * Decode a frame body (everything after the size prefix) without converting
 * the payload to text. Fragments of one response are only valid UTF-8 once
 * joined, since the server splits on byte count.
 */
export function decodeRawPacket(body: Uint8Array): RawPacket {
  if (body.length < MIN_PACKET_SIZE) {
    throw RconError.decode(
      `Expected packet length to be at least ${MIN_PACKET_SIZE} bytes, got: ${body.length}`,
    );
  }

  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const id = view.getInt32(0, true);
  const type = packetTypeFromWire(view.getInt32(4, true));

  const payloadEnd = body.length - PACKET_PAD_SIZE;
  if (body[payloadEnd] !== 0 || body[payloadEnd + 1] !== 0) {
    throw RconError.decode("Missing padding at the end of the message");
  }

  return { id, type, payload: body.subarray(HEADER_SIZE, payloadEnd) };
}

/** Strict UTF-8 conversion of payload bytes. */
export function decodePayload(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (e) {
    throw RconError.decode(
      `Failed to convert message body to a UTF-8 string: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}

/**
 * Decode a frame body: everything after the size prefix.
 */
export function decodePacket(body: Uint8Array): Packet {
  const raw = decodeRawPacket(body);
  return { id: raw.id, type: raw.type, payload: decodePayload(raw.payload) };
}
