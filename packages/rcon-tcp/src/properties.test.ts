import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  PropertiesError,
  parseProperties,
  rconProperties,
  readRconProperties,
} from "./properties.ts";

const SERVER_PROPERTIES = `#Minecraft server properties
#Sat Oct 17 12:00:00 UTC 2026
enable-rcon=true
level-name=survival
motd=A Minecraft Server

rcon.password = test-secret
rcon.port=25575
`;

function propertiesError(fn: () => unknown): PropertiesError {
  try {
    fn();
  } catch (e) {
    if (e instanceof PropertiesError) return e;
    throw e;
  }
  throw new Error("expected a PropertiesError");
}

describe("parseProperties", () => {
  it("reads key=value pairs, skipping comments and blank lines", () => {
    const entries = parseProperties(SERVER_PROPERTIES);
    expect(entries.get("motd")).toBe("A Minecraft Server");
    expect(entries.get("rcon.password")).toBe("test-secret");
    expect(entries.size).toBe(5);
  });

  it("splits on the first equals sign", () => {
    expect(parseProperties("rcon.password=a=b").get("rcon.password")).toBe("a=b");
  });

  it("handles CRLF line endings", () => {
    expect(parseProperties("a=1\r\nb=2\r\n").get("b")).toBe("2");
  });

  it("reports malformed lines by number", () => {
    const err = propertiesError(() => parseProperties("# comment\nmotd=hi\nbroken\n"));
    expect(err.kind).toBe("malformed-line");
    expect(err.line).toBe(3);
    expect(err.message).toBe("Broken server.properties file. Malformed line 3");
  });
});

describe("rconProperties", () => {
  it("extracts the RCON settings", () => {
    expect(rconProperties(parseProperties(SERVER_PROPERTIES))).toEqual({
      port: 25575,
      password: "test-secret",
      enabled: true,
      levelName: "survival",
    });
  });

  it("defaults to disabled and the default world", () => {
    const props = rconProperties(parseProperties("rcon.port=25575\nrcon.password=test-secret"));
    expect(props.enabled).toBe(false);
    expect(props.levelName).toBe("world");
  });

  it.each(["", "rcon.port=\n", "rcon.port=0\n", "rcon.port=70000\n", "rcon.port=25575a\n"])(
    "rejects port settings %j",
    (text) => {
      const err = propertiesError(() =>
        rconProperties(parseProperties(`${text}rcon.password=test-secret`)),
      );
      expect(err.kind).toBe("invalid-port");
    },
  );

  it("requires a password", () => {
    const err = propertiesError(() => rconProperties(parseProperties("rcon.port=25575")));
    expect(err.kind).toBe("missing-password");
  });
});

describe("readRconProperties", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rconsole-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the file", async () => {
    const path = join(dir, "server.properties");
    await writeFile(path, SERVER_PROPERTIES);
    expect(await readRconProperties(path)).toMatchObject({ port: 25575, password: "test-secret" });
  });

  it("reports a missing file", async () => {
    const err = await readRconProperties(join(dir, "missing.properties")).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PropertiesError);
    if (!(err instanceof PropertiesError)) return;
    expect(err.kind).toBe("open");
    expect(err.message).toMatch(/^Failed to open server\.properties file: ENOENT/);
  });
});
