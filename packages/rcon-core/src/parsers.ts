// Parsers for the text responses of the console commands.

import { ClientError } from "./client_error.ts";

/** Tick timings as printed by the server, units included (e.g. "13.2ms"). */
export interface TickStats {
  average: string;
  target: string;
  p50: string;
  p95: string;
  p99: string;
}

/**
 * Parse the `list` response:
 * "There are 2 of a max of 20 players online: Alice, Bob"
 */
export function parsePlayerList(response: string): string[] {
  const separator = response.indexOf(": ");
  if (separator < 0) return [];

  const players = response.slice(separator + 2);
  if (players.length === 0) return [];
  return players.split(", ");
}

/**
 * Parse the `tick query` response. The server prints something like:
 *
 *   Target tick rate: 20.0 per second.
 *   Average time per tick: 13.2ms (Target: 50.0ms)
 *   Percentiles: P50: 13.0ms P95: 16.0ms P99: 18.6ms, sample: 100
 *
 * Exactly five "ms" tokens are expected, in that order.
 */
export function parseTickStats(response: string): TickStats {
  const timings = response
    .replace(/[:,()]/g, " ")
    .split(/\s+/)
    .filter((word) => word.endsWith("ms"));

  if (timings.length !== 5) {
    throw ClientError.tickStats(response);
  }
  const [average, target, p50, p95, p99] = timings;
  return { average, target, p50, p95, p99 };
}
