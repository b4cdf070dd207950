/**
 * HTTP client for the Crawler Agent API.
 *
 * Every endpoint comes in two shapes: the throwing one (`games.create`,
 * `games.action`, ...) and an `ApiResult` one (`games.start`, `games.submit`,
 * `games.fetch`) that hands back the classified error as a value. The runner
 * uses the latter and switches on `error.kind`.
 *
 * The client never retries by itself: an action POST must reach the server
 * at most once per call.
 */

import type * as z from "zod";
import { serializeAction, type Action } from "./actions.js";
import { DEFAULT_TIMEOUT_MS, resolveApiKey, resolveBaseUrl } from "./env.js";
import {
  NetworkError,
  ResponseDecodeError,
  classifyErrorResponse,
  type ClassifiedError,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import {
  AbandonGameResponseSchema,
  ActionResponseSchema,
  CreateGameResponseSchema,
  GameStateResponseSchema,
  HealthResponseSchema,
  ListGamesResponseSchema,
  type AbandonGameResponse,
  type ActionResponse,
  type CreateGameResponse,
  type GameStateResponse,
  type GameStatus,
  type HealthResponse,
  type ListGamesResponse,
} from "./types.js";
import { USER_AGENT } from "./version.js";

// ── Result type ──────────────────────────────────────────────────

export type ApiResult<T> = { ok: true; value: T } | { ok: false; error: ClassifiedError };

export function unwrap<T>(result: ApiResult<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}

// ── Options ──────────────────────────────────────────────────────

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CrawlerClientOptions {
  /** Falls back to CRAWLERVERSE_API_KEY. */
  apiKey?: string;
  /** Falls back to CRAWLERVERSE_BASE_URL, then https://crawlerver.se/api/agent. */
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface CreateGameOptions {
  /** Leaderboard identifier of the model playing, e.g. "anthropic/claude-haiku-4-5". */
  modelId?: string;
}

export interface ListGamesOptions {
  status?: GameStatus;
  limit?: number;
  offset?: number;
}

type HttpMethod = "GET" | "POST";

type Send = <S extends z.ZodTypeAny>(
  method: HttpMethod,
  path: string,
  schema: S,
  options?: { body?: unknown; query?: URLSearchParams },
) => Promise<ApiResult<z.output<S>>>;

// ── Games resource ───────────────────────────────────────────────

export class GamesResource {
  constructor(private readonly send: Send) {}

  /** POST /games */
  async start(options: CreateGameOptions = {}): Promise<ApiResult<CreateGameResponse>> {
    const body: { modelId?: string } = {};
    if (options.modelId !== undefined) {
      body.modelId = options.modelId;
    }
    return this.send("POST", "/games", CreateGameResponseSchema, { body });
  }

  /** GET /games/{id} */
  async fetch(gameId: string): Promise<ApiResult<GameStateResponse>> {
    return this.send("GET", `/games/${encodeURIComponent(gameId)}`, GameStateResponseSchema);
  }

  /** POST /games/{id}/action */
  async submit(gameId: string, action: Action): Promise<ApiResult<ActionResponse>> {
    return this.send(
      "POST",
      `/games/${encodeURIComponent(gameId)}/action`,
      ActionResponseSchema,
      { body: serializeAction(action) },
    );
  }

  async create(options: CreateGameOptions = {}): Promise<CreateGameResponse> {
    return unwrap(await this.start(options));
  }

  async get(gameId: string): Promise<GameStateResponse> {
    return unwrap(await this.fetch(gameId));
  }

  async action(gameId: string, action: Action): Promise<ActionResponse> {
    return unwrap(await this.submit(gameId, action));
  }

  /** GET /games: the agent's own games, newest first. */
  async list(options: ListGamesOptions = {}): Promise<ListGamesResponse> {
    const query = new URLSearchParams();
    if (options.status !== undefined) {
      query.set("status", options.status);
    }
    query.set("limit", String(options.limit ?? 20));
    query.set("offset", String(options.offset ?? 0));
    return unwrap(await this.send("GET", "/games", ListGamesResponseSchema, { query }));
  }

  /** POST /games/{id}/abandon */
  async abandon(gameId: string): Promise<AbandonGameResponse> {
    return unwrap(
      await this.send(
        "POST",
        `/games/${encodeURIComponent(gameId)}/abandon`,
        AbandonGameResponseSchema,
      ),
    );
  }
}

// ── Client class ─────────────────────────────────────────────────

export class CrawlerClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly games: GamesResource;

  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  /** Throws AuthenticationError when no API key can be resolved. */
  constructor(options: CrawlerClientOptions = {}) {
    const apiKey = resolveApiKey(options.apiKey);
    this.baseUrl = resolveBaseUrl(options.baseUrl);
    this.timeoutMs =
      typeof options.timeoutMs === "number" && Number.isFinite(options.timeoutMs)
        ? Math.max(1, options.timeoutMs)
        : DEFAULT_TIMEOUT_MS;
    this.headers = {
      Authorization: `Bearer ${apiKey}`,
      "User-Agent": USER_AGENT,
      "Content-Type": "application/json",
    };
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger("client");
    this.games = new GamesResource((method, path, schema, sendOptions) =>
      this.request(method, path, schema, sendOptions),
    );
  }

  /** GET /health */
  async health(): Promise<HealthResponse> {
    return unwrap(await this.request("GET", "/health", HealthResponseSchema));
  }

  // ── HTTP helpers ─────────────────────────────────────────────

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: { body?: unknown; query?: URLSearchParams } = {},
  ): Promise<ApiResult<z.output<S>>> {
    const endpoint = `${method} ${path}`;
    const qs = options.query?.toString();
    const url = `${this.baseUrl}${path}${qs ? `?${qs}` : ""}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const timedOut = (): ApiResult<never> => ({
      ok: false,
      error: new NetworkError(`Request timed out after ${this.timeoutMs}ms`, endpoint),
    });

    this.logger.debug(endpoint);

    // The deadline covers the body read as well as the headers.
    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method,
          headers: this.headers,
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
          signal: controller.signal,
        });
      } catch (err) {
        if (controller.signal.aborted) return timedOut();
        const message = err instanceof Error ? err.message : "Network error";
        return { ok: false, error: new NetworkError(message, endpoint) };
      }

      if (res.status >= 400) {
        let text = "";
        try {
          text = await res.text();
        } catch (err) {
          if (controller.signal.aborted) return timedOut();
          this.logger.warn("Failed to read error response body", {
            status: res.status,
            reason: err instanceof Error ? err.message : undefined,
          });
        }
        const body = this.parseErrorBody(res.status, text);
        return { ok: false, error: classifyErrorResponse(res.status, body, res.headers, endpoint) };
      }

      let data: unknown;
      try {
        data = await res.json();
      } catch {
        if (controller.signal.aborted) return timedOut();
        return {
          ok: false,
          error: new ResponseDecodeError("Expected a JSON response body", res.status, [], endpoint),
        };
      }

      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        return {
          ok: false,
          error: new ResponseDecodeError(
            `Unexpected response shape from ${endpoint}`,
            res.status,
            parsed.error.issues,
            endpoint,
          ),
        };
      }
      return { ok: true, value: parsed.data };
    } finally {
      clearTimeout(timer);
    }
  }

  /** Decoded JSON error body, or `{ error: <raw text> }` when it is not JSON. */
  private parseErrorBody(status: number, text: string): unknown {
    if (!text.trim()) return {};
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      this.logger.warn("Failed to parse error response as JSON", { status });
      return { error: text };
    }
  }
}
