import { vi } from "vitest";
import type { FetchLike } from "../client.js";
import type { LogSink } from "../logger.js";
import { ObservationSchema, type Observation } from "../types.js";

export const OBSERVATION_JSON = {
  turn: 47,
  floor: 3,
  player: {
    position: [5, 8],
    hp: 12,
    maxHp: 20,
    attack: 8,
    defense: 4,
    equippedWeapon: "iron-sword",
    equippedArmor: null,
  },
  inventory: [
    { id: "item-1", type: "potion", name: "Health Potion" },
    { id: "item-2", type: "scroll", name: "Scroll of Light" },
  ],
  visibleTiles: [
    { x: 6, y: 8, type: "floor", items: [], monster: { type: "rat", hp: 3, maxHp: 5 } },
    { x: 5, y: 7, type: "wall", items: [] },
    { x: 5, y: 8, type: "floor", items: ["gold-coin", "health-potion"] },
  ],
  messages: ["The rat bites you for 3 damage", "You attack the rat"],
};

export function makeObservation(overrides: Record<string, unknown> = {}): Observation {
  return ObservationSchema.parse({ ...OBSERVATION_JSON, ...overrides });
}

// ── In-process fetch ─────────────────────────────────────────────

export interface StubResponse {
  status?: number;
  json?: unknown;
  text?: string;
  headers?: Record<string, string>;
  /** Sends this much of the body, then stalls until the request is aborted. */
  stalledBody?: string;
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Serves the given responses in order and records every request.
 * An `Error` entry is thrown from fetch instead of answered.
 */
export function stubFetch(responses: Array<StubResponse | Error>) {
  const queue = [...responses];
  const requests: RecordedRequest[] = [];

  const fetch = vi.fn<FetchLike>(async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({
      url,
      method: init.method ?? "GET",
      headers,
      body: typeof init.body === "string" ? JSON.parse(init.body) : undefined,
    });

    const next = queue.shift();
    if (next === undefined) throw new Error(`Unexpected request: ${init.method} ${url}`);
    if (next instanceof Error) throw next;

    if (next.stalledBody !== undefined) {
      const prefix = new TextEncoder().encode(next.stalledBody);
      const signal = init.signal;
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(prefix);
          signal?.addEventListener("abort", () => {
            controller.error(new Error("This operation was aborted"));
          });
        },
      });
      return new Response(stream, { status: next.status ?? 200, headers: next.headers });
    }

    const body = next.text ?? (next.json === undefined ? "" : JSON.stringify(next.json));
    return new Response(body, { status: next.status ?? 200, headers: next.headers });
  });

  return { fetch, requests };
}

export function captureLogs() {
  const lines: Array<{ level: string; line: string }> = [];
  const sink: LogSink = (level, line) => {
    lines.push({ level, line });
  };
  return { sink, lines };
}
