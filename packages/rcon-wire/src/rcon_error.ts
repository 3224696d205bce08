// Protocol-level error taxonomy.

export type RconErrorKind =
  | "connect"
  | "decode"
  | "payload-too-big"
  | "invalid-id"
  | "write"
  | "read"
  | "auth-fail"
  | "id-mismatch"
  | "invalid-packet-type"
  | "closed";

export interface RconErrorDetails {
  expected?: number | string;
  actual?: number | string;
  cause?: unknown;
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Error raised by the codec and the connection states.
 *
 * The codec and connection layers never recover from these; the connection
 * manager retires its connection on any of them.
 */
export class RconError extends Error {
  readonly expected?: number | string;
  readonly actual?: number | string;

  constructor(
    public readonly kind: RconErrorKind,
    message: string,
    details: RconErrorDetails = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "RconError";
    this.expected = details.expected;
    this.actual = details.actual;
  }

  /** Read and write failures mean the socket is in an unknown state. */
  isConnectionBreaking(): boolean {
    return this.kind === "read" || this.kind === "write";
  }

  static connect(cause: unknown): RconError {
    return new RconError("connect", `Failed to connect to the server: ${describe(cause)}`, {
      cause,
    });
  }

  static decode(context: string): RconError {
    return new RconError(
      "decode",
      `Failed to decode the message received from the server: ${context}`,
    );
  }

  static payloadTooBig(max: number, actual: number): RconError {
    return new RconError(
      "payload-too-big",
      `A message payload must be at most ${max} bytes, got: ${actual}`,
      { expected: max, actual },
    );
  }

  static invalidId(id: number): RconError {
    return new RconError("invalid-id", `Expected ID to be a non-negative 32-bit integer, got: ${id}`, {
      actual: id,
    });
  }

  static write(cause: unknown): RconError {
    return new RconError("write", `Failed to send a message to the server: ${describe(cause)}`, {
      cause,
    });
  }

  static read(cause: unknown): RconError {
    return new RconError("read", `Failed to read a message from the server: ${describe(cause)}`, {
      cause,
    });
  }

  static authFail(): RconError {
    return new RconError("auth-fail", "Server authentication failed");
  }

  static idMismatch(expected: number, actual: number): RconError {
    return new RconError(
      "id-mismatch",
      `Expected sequence ID ${expected} from the server, got: ${actual}`,
      { expected, actual },
    );
  }

  static invalidPacketType(expected: string, actual: string): RconError {
    return new RconError(
      "invalid-packet-type",
      `Invalid packet type received from the server. Expected ${expected}, got: ${actual}`,
      { expected, actual },
    );
  }

  static closed(): RconError {
    return new RconError("closed", "connection already handed over or closed");
  }
}
