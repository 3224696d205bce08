// server.properties reader.
//
// The file is the server's own `key=value` settings list; the RCON settings
// in it are what a console needs to reach that server.

import { readFile } from "node:fs/promises";

export type PropertiesErrorKind =
  | "open"
  | "malformed-line"
  | "invalid-port"
  | "missing-password"
  | "rcon-disabled";

export class PropertiesError extends Error {
  /** 1-based line number, for `malformed-line`. */
  readonly line?: number;

  constructor(
    public readonly kind: PropertiesErrorKind,
    message: string,
    options: { cause?: unknown; line?: number } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PropertiesError";
    this.line = options.line;
  }

  static open(cause: unknown): PropertiesError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new PropertiesError("open", `Failed to open server.properties file: ${reason}`, {
      cause,
    });
  }

  static malformedLine(line: number): PropertiesError {
    return new PropertiesError(
      "malformed-line",
      `Broken server.properties file. Malformed line ${line}`,
      { line },
    );
  }

  static invalidPort(): PropertiesError {
    return new PropertiesError(
      "invalid-port",
      "The server.properties has no rcon.port property or it is invalid",
    );
  }

  static missingPassword(): PropertiesError {
    return new PropertiesError(
      "missing-password",
      "The server.properties does not contain an rcon.password property",
    );
  }

  static rconDisabled(): PropertiesError {
    return new PropertiesError("rcon-disabled", "RCON is disabled (enable-rcon is not true)");
  }
}

export interface RconProperties {
  port: number;
  password: string;
  /** Value of `enable-rcon`; false when absent. */
  enabled: boolean;
  /** World directory name, "world" unless `level-name` says otherwise. */
  levelName: string;
}

/**
 * Parse `key=value` lines. Blank lines and `#` comments are skipped; keys
 * and values are trimmed and a later key wins.
 */
export function parseProperties(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith("#")) return;

    const eq = line.indexOf("=");
    if (eq < 0) throw PropertiesError.malformedLine(index + 1);
    entries.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  });

  return entries;
}

export function rconProperties(entries: Map<string, string>): RconProperties {
  const portText = entries.get("rcon.port");
  const port = portText !== undefined && /^\d+$/.test(portText) ? Number(portText) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw PropertiesError.invalidPort();
  }

  const password = entries.get("rcon.password");
  if (password === undefined) {
    throw PropertiesError.missingPassword();
  }

  return {
    port,
    password,
    enabled: entries.get("enable-rcon") === "true",
    levelName: entries.get("level-name") ?? "world",
  };
}

/** Read the RCON settings from a server.properties file. */
export async function readRconProperties(path: string): Promise<RconProperties> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw PropertiesError.open(e);
  }
  return rconProperties(parseProperties(text));
}
