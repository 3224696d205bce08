import { beforeEach, describe, expect, it } from "vitest";
import { PacketType, RconError } from "@rconsole/wire";

import { Disconnected, type Authenticated } from "./connection.ts";
import { FRAGMENT_PAYLOAD_SIZE, StubServer, frameBody } from "./stub_server.ts";

async function rejection(promise: Promise<unknown>): Promise<RconError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof RconError) return e;
    throw e;
  }
  throw new Error("expected an RconError");
}

describe("connection states", () => {
  let server: StubServer;

  beforeEach(() => {
    server = new StubServer();
  });

  async function login(timeoutMs?: number): Promise<Authenticated> {
    const connected = await new Disconnected({ timeoutMs }).connect("127.0.0.1:25575", server.dial);
    return connected.authenticate("test-secret");
  }

  describe("connect", () => {
    it("dials the address", async () => {
      const connected = await new Disconnected().connect("127.0.0.1:25575", server.dial);
      expect(connected.state).toBe("connected");
      expect(server.dials).toBe(1);
    });

    it("classifies dial failures as connect errors", async () => {
      server.refuse = true;
      const err = await rejection(new Disconnected().connect("127.0.0.1:25575", server.dial));
      expect(err.kind).toBe("connect");
      expect(err.message).toBe("Failed to connect to the server: connect ECONNREFUSED");
    });
  });

  describe("authenticate", () => {
    it("sends the password with id 0 and type 3", async () => {
      const conn = await login();
      expect(conn.state).toBe("authenticated");
      expect(server.latest().sent).toEqual([
        { id: 0, type: PacketType.Authentication, payload: "test-secret" },
      ]);
    });

    it("fails on a wrong password and drops the socket", async () => {
      const connected = await new Disconnected().connect("127.0.0.1:25575", server.dial);
      const err = await rejection(connected.authenticate("wrong"));
      expect(err.kind).toBe("auth-fail");
      expect(server.latest().destroyed).toBe(true);
    });

    it("treats id -1 as failure whatever the payload", async () => {
      server.script = (packet) =>
        packet.type === PacketType.Authentication
          ? [frameBody(-1, PacketType.Command, "welcome")]
          : undefined;
      const connected = await new Disconnected().connect("127.0.0.1:25575", server.dial);
      expect((await rejection(connected.authenticate("test-secret"))).kind).toBe("auth-fail");
    });

    it("rejects an acknowledgement for another id", async () => {
      server.script = (packet) =>
        packet.type === PacketType.Authentication
          ? [frameBody(5, PacketType.Command, "")]
          : undefined;
      const connected = await new Disconnected().connect("127.0.0.1:25575", server.dial);
      const err = await rejection(connected.authenticate("test-secret"));
      expect(err.kind).toBe("id-mismatch");
      expect(err.expected).toBe(0);
      expect(err.actual).toBe(5);
    });

    it("rejects a response-typed acknowledgement", async () => {
      server.script = (packet) =>
        packet.type === PacketType.Authentication
          ? [frameBody(0, PacketType.Response, "")]
          : undefined;
      const connected = await new Disconnected().connect("127.0.0.1:25575", server.dial);
      const err = await rejection(connected.authenticate("test-secret"));
      expect(err.kind).toBe("invalid-packet-type");
      expect(err.message).toBe(
        "Invalid packet type received from the server. Expected command, got: response",
      );
    });

    it("cannot be attempted twice on the same connection", async () => {
      const connected = await new Disconnected().connect("127.0.0.1:25575", server.dial);
      await connected.authenticate("test-secret");
      expect((await rejection(connected.authenticate("test-secret"))).kind).toBe("closed");
    });

    it("cannot be attempted after destroy", async () => {
      const connected = await new Disconnected().connect("127.0.0.1:25575", server.dial);
      connected.destroy();
      expect(server.latest().destroyed).toBe(true);
      expect((await rejection(connected.authenticate("test-secret"))).kind).toBe("closed");
    });
  });

  describe("command", () => {
    it("allocates increasing ids starting at 1", async () => {
      const conn = await login();
      expect(await conn.command("list")).toBe("ran list");
      expect(await conn.command("seed")).toBe("ran seed");
      expect(server.latest().sent.slice(1)).toEqual([
        { id: 1, type: PacketType.Command, payload: "list" },
        { id: 2, type: PacketType.Command, payload: "seed" },
      ]);
    });

    it("rejects a response with another id", async () => {
      server.script = (packet) =>
        packet.type === PacketType.Command ? [frameBody(99, PacketType.Response, "x")] : undefined;
      const conn = await login();
      const err = await rejection(conn.command("list"));
      expect(err.kind).toBe("id-mismatch");
      expect(err.expected).toBe(1);
      expect(err.actual).toBe(99);
    });

    it("rejects a command-typed response", async () => {
      server.script = (packet) =>
        packet.type === PacketType.Command
          ? [frameBody(packet.id, PacketType.Command, "x")]
          : undefined;
      const conn = await login();
      const err = await rejection(conn.command("list"));
      expect(err.kind).toBe("invalid-packet-type");
      expect(err.expected).toBe("response");
      expect(err.actual).toBe("command");
    });

    it("does not probe for a response shorter than a full frame", async () => {
      server.respond = () => "a".repeat(FRAGMENT_PAYLOAD_SIZE - 1);
      const conn = await login();
      expect(await conn.command("help")).toHaveLength(FRAGMENT_PAYLOAD_SIZE - 1);
      expect(server.latest().sent.filter((p) => p.type === PacketType.Response)).toEqual([]);
    });

    it("fails once the connection is gone", async () => {
      const conn = await login();
      server.latest().breakConnection();
      expect((await rejection(conn.command("list"))).kind).toBe("write");
    });

    it("honours the read timeout", async () => {
      server.script = (packet) => (packet.type === PacketType.Command ? [] : undefined);
      const conn = await login(20);
      const err = await rejection(conn.command("list"));
      expect(err.kind).toBe("read");
      expect(err.message).toBe("Failed to read a message from the server: timed out after 20 ms");
    });
  });

  describe("fragmented responses", () => {
    it("concatenates continuation frames after a single probe", async () => {
      const text =
        "a".repeat(FRAGMENT_PAYLOAD_SIZE) + "b".repeat(FRAGMENT_PAYLOAD_SIZE) + "c".repeat(10);
      server.respond = () => text;
      const conn = await login();

      expect(await conn.command("help")).toBe(text);
      expect(server.latest().sent.slice(1)).toEqual([
        { id: 1, type: PacketType.Command, payload: "help" },
        { id: 2, type: PacketType.Response, payload: "" },
      ]);
    });

    it("probes when the response exactly fills one frame", async () => {
      const text = "x".repeat(FRAGMENT_PAYLOAD_SIZE);
      server.respond = () => text;
      const conn = await login();

      expect(await conn.command("help")).toBe(text);
      expect(server.latest().sent.filter((p) => p.type === PacketType.Response)).toHaveLength(1);
    });

    it("keeps allocating ids after reassembly", async () => {
      server.respond = (command) => (command === "help" ? "x".repeat(FRAGMENT_PAYLOAD_SIZE) : "ok");
      const conn = await login();
      await conn.command("help");
      expect(await conn.command("list")).toBe("ok");
      expect(server.latest().sent[3]).toEqual({ id: 3, type: PacketType.Command, payload: "list" });
    });

    it("joins a character split across two frames", async () => {
      // "é" is 0xc3 0xa9; the first frame ends after 0xc3.
      const head = new Uint8Array(FRAGMENT_PAYLOAD_SIZE).fill(0x61);
      head[FRAGMENT_PAYLOAD_SIZE - 1] = 0xc3;
      const tail = new Uint8Array([0xa9, 0x62, 0x63]);
      server.script = (packet) =>
        packet.type === PacketType.Command
          ? [
              frameBody(packet.id, PacketType.Response, head),
              frameBody(packet.id, PacketType.Response, tail),
            ]
          : undefined;
      const conn = await login();

      expect(await conn.command("help")).toBe("a".repeat(FRAGMENT_PAYLOAD_SIZE - 1) + "ébc");
    });

    it("rejects invalid UTF-8 in a reassembled response", async () => {
      const head = new Uint8Array(FRAGMENT_PAYLOAD_SIZE).fill(0x61);
      head[FRAGMENT_PAYLOAD_SIZE - 1] = 0xc3;
      server.script = (packet) =>
        packet.type === PacketType.Command
          ? [frameBody(packet.id, PacketType.Response, head)]
          : undefined;
      const conn = await login();

      const err = await rejection(conn.command("help"));
      expect(err.kind).toBe("decode");
      expect(err.message).toContain("Failed to convert message body to a UTF-8 string");
    });

    it("rejects an unexpected reply to the probe", async () => {
      server.respond = () => "x".repeat(FRAGMENT_PAYLOAD_SIZE);
      server.script = (packet) =>
        packet.type === PacketType.Response
          ? [frameBody(packet.id, PacketType.Response, "Unknown command")]
          : undefined;
      const conn = await login();
      expect((await rejection(conn.command("help"))).kind).toBe("invalid-packet-type");
    });

    it("rejects a command-typed frame carrying the probe id", async () => {
      server.respond = () => "x".repeat(FRAGMENT_PAYLOAD_SIZE);
      server.script = (packet) =>
        packet.type === PacketType.Response
          ? [frameBody(packet.id, PacketType.Command, "Unknown request 0")]
          : undefined;
      const conn = await login();
      const err = await rejection(conn.command("help"));
      expect(err.kind).toBe("invalid-packet-type");
      expect(err.actual).toBe('command "Unknown request 0"');
    });

    it("rejects frames for neither the command nor the probe", async () => {
      server.respond = () => "x".repeat(FRAGMENT_PAYLOAD_SIZE);
      server.script = (packet) =>
        packet.type === PacketType.Response
          ? [frameBody(77, PacketType.Response, "stray")]
          : undefined;
      const conn = await login();
      const err = await rejection(conn.command("help"));
      expect(err.kind).toBe("id-mismatch");
      expect(err.expected).toBe(2);
      expect(err.actual).toBe(77);
    });
  });

  describe("teardown", () => {
    it("half-closes on disconnect and refuses further commands", async () => {
      const conn = await login();
      conn.disconnect();
      expect(server.latest().closed).toBe(true);
      expect(conn.isOpen()).toBe(false);
      expect((await rejection(conn.command("list"))).kind).toBe("closed");
    });

    it("destroys the socket", async () => {
      const conn = await login();
      conn.destroy();
      expect(server.latest().destroyed).toBe(true);
      expect(server.latest().closed).toBe(false);
    });
  });
});
