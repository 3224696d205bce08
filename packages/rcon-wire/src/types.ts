// RCON packet types.
//
// Wire format (all integers little-endian i32):
// [size][id][type][payload bytes][0x00 0x00]

/** Packet type tags as they appear on the wire. */
export const PacketType = {
  /**
   * Server → client command output. Also used client → server as the empty
   * probe that terminates a fragmented response.
   */
  Response: 0,
  /** Client → server command. The server reuses it to acknowledge authentication. */
  Command: 2,
  /** Client → server login. Never sent by the server. */
  Authentication: 3,
} as const;

export type PacketType = (typeof PacketType)[keyof typeof PacketType];

/** Smallest valid frame size: id + type + 2 pad bytes. */
export const MIN_PACKET_SIZE = 10;
/** Largest frame the server sends; a frame of exactly this size may be fragmented. */
export const MAX_PACKET_SIZE = 4106;
export const PACKET_PAD_SIZE = 2;
/** Largest payload a client may send, in UTF-8 bytes. */
export const MAX_CLIENT_PAYLOAD_SIZE = 1446;

/** Sequence id reserved for the authentication exchange. */
export const AUTH_ID = 0;
/** Id the server answers with when the password is wrong. */
export const AUTH_FAILED_ID = -1;

/**
 * The server's reply to the fragmentation probe. It only marks the end of a
 * fragmented response on servers that answer unknown packet types with this
 * exact text.
 */
export const FRAGMENT_END_SENTINEL = "Unknown request 0";

export interface Packet {
  id: number;
  type: PacketType;
  payload: string;
}

/** A packet whose payload is still the bytes read off the wire. */
export interface RawPacket {
  id: number;
  type: PacketType;
  payload: Uint8Array;
}

/** A decoded packet together with the size its frame declared. */
export interface ReceivedPacket<P = Packet> {
  packet: P;
  size: number;
}

export function authenticationPacket(id: number, password: string): Packet {
  return { id, type: PacketType.Authentication, payload: password };
}

export function commandPacket(id: number, command: string): Packet {
  return { id, type: PacketType.Command, payload: command };
}

/** Empty response-typed packet sent to detect the end of a fragmented response. */
export function probePacket(id: number): Packet {
  return { id, type: PacketType.Response, payload: "" };
}

export function packetTypeName(type: PacketType): string {
  switch (type) {
    case PacketType.Response:
      return "response";
    case PacketType.Command:
      return "command";
    case PacketType.Authentication:
      return "authentication";
  }
}
