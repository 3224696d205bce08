// @rconsole/wire - RCON packet types, codec and protocol errors.

export {
  PacketType,
  MIN_PACKET_SIZE,
  MAX_PACKET_SIZE,
  PACKET_PAD_SIZE,
  MAX_CLIENT_PAYLOAD_SIZE,
  AUTH_ID,
  AUTH_FAILED_ID,
  FRAGMENT_END_SENTINEL,
  authenticationPacket,
  commandPacket,
  probePacket,
  packetTypeName,
  type Packet,
  type RawPacket,
  type ReceivedPacket,
} from "./types.ts";

export {
  encodePacket,
  decodePacket,
  decodeRawPacket,
  decodePayload,
  readFrameSize,
  packetTypeFromWire,
} from "./codec.ts";

export { RconError, type RconErrorKind, type RconErrorDetails } from "./rcon_error.ts";
