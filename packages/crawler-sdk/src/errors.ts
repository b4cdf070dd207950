/**
 * Error taxonomy for the Crawler Agent API.
 *
 * Every failure carries a literal `kind`, so callers (the runner first of
 * all) can switch on it instead of walking a class hierarchy.
 */

import * as z from "zod";
import { TerminalOutcomeSchema, type TerminalOutcome } from "./types.js";

export type CrawlerErrorKind =
  | "validation"
  | "authentication"
  | "forbidden"
  | "not_found"
  | "conflict"
  | "game_over"
  | "invalid_action"
  | "rate_limit"
  | "api"
  | "network"
  | "decode";

export const DEFAULT_RETRY_AFTER_SECONDS = 60;

// ── Error classes ────────────────────────────────────────────────

export abstract class CrawlerApiError extends Error {
  abstract readonly kind: CrawlerErrorKind;

  constructor(
    message: string,
    public readonly status: number,
    public readonly endpoint?: string,
  ) {
    super(message);
    this.name = "CrawlerApiError";
  }

  override toString(): string {
    return `${this.name}: ${this.status}: ${this.message}`;
  }
}

export class ValidationError extends CrawlerApiError {
  readonly kind = "validation" as const;

  constructor(
    message: string,
    public readonly details?: Readonly<Record<string, string[]>>,
    endpoint?: string,
  ) {
    super(message, 400, endpoint);
    this.name = "ValidationError";
  }
}

/** 401, or no API key configured at all. */
export class AuthenticationError extends CrawlerApiError {
  readonly kind = "authentication" as const;

  constructor(message: string, endpoint?: string) {
    super(message, 401, endpoint);
    this.name = "AuthenticationError";
  }
}

/** 403: key not activated or suspended. */
export class ForbiddenError extends CrawlerApiError {
  readonly kind = "forbidden" as const;

  constructor(message: string, endpoint?: string) {
    super(message, 403, endpoint);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends CrawlerApiError {
  readonly kind = "not_found" as const;

  constructor(message: string, endpoint?: string) {
    super(message, 404, endpoint);
    this.name = "NotFoundError";
  }
}

/** 409 without a terminal outcome payload. Fatal. */
export class ConflictError extends CrawlerApiError {
  readonly kind = "conflict" as const;

  constructor(message: string, endpoint?: string) {
    super(message, 409, endpoint);
    this.name = "ConflictError";
  }
}

/** 409 carrying the outcome of a game that already ended server-side. */
export class GameOverError extends CrawlerApiError {
  readonly kind = "game_over" as const;

  constructor(
    message: string,
    public readonly outcome: TerminalOutcome,
    endpoint?: string,
  ) {
    super(message, 409, endpoint);
    this.name = "GameOverError";
  }
}

/** 422: the game engine rejected an otherwise well-formed action. */
export class InvalidActionError extends CrawlerApiError {
  readonly kind = "invalid_action" as const;

  constructor(
    message: string,
    public readonly code: string,
    endpoint?: string,
  ) {
    super(message, 422, endpoint);
    this.name = "InvalidActionError";
  }
}

export class RateLimitError extends CrawlerApiError {
  readonly kind = "rate_limit" as const;

  constructor(
    message: string,
    public readonly retryAfter: number,
    endpoint?: string,
  ) {
    super(message, 429, endpoint);
    this.name = "RateLimitError";
  }
}

/** Any other status >= 400. */
export class ApiError extends CrawlerApiError {
  readonly kind = "api" as const;

  constructor(message: string, status: number, endpoint?: string) {
    super(message, status, endpoint);
    this.name = "ApiError";
  }
}

/** No response at all: connection failure or timeout. */
export class NetworkError extends CrawlerApiError {
  readonly kind = "network" as const;

  constructor(message: string, endpoint?: string) {
    super(message, 0, endpoint);
    this.name = "NetworkError";
  }
}

/** A 2xx response whose body does not match the expected schema. */
export class ResponseDecodeError extends CrawlerApiError {
  readonly kind = "decode" as const;

  constructor(
    message: string,
    status: number,
    public readonly issues: readonly z.ZodIssue[] = [],
    endpoint?: string,
  ) {
    super(message, status, endpoint);
    this.name = "ResponseDecodeError";
  }
}

export type ClassifiedError =
  | ValidationError
  | AuthenticationError
  | ForbiddenError
  | NotFoundError
  | ConflictError
  | GameOverError
  | InvalidActionError
  | RateLimitError
  | ApiError
  | NetworkError
  | ResponseDecodeError;

export function isCrawlerApiError(value: unknown): value is ClassifiedError {
  return value instanceof CrawlerApiError;
}

// ── Response classification ──────────────────────────────────────

export interface HeaderLookup {
  get(name: string): string | null;
}

const ErrorBodySchema = z.object({
  error: z.string().optional().catch(undefined),
  details: z.record(z.string(), z.array(z.string())).optional().catch(undefined),
  code: z.string().optional().catch(undefined),
  outcome: z.unknown().optional(),
});

function parseRetryAfter(raw: string | null): number {
  if (raw === null) return DEFAULT_RETRY_AFTER_SECONDS;
  const trimmed = raw.trim();
  const seconds = Number(trimmed);
  return trimmed !== "" && Number.isInteger(seconds) && seconds >= 0
    ? seconds
    : DEFAULT_RETRY_AFTER_SECONDS;
}

/**
 * Map a failed response to its classified error. `body` is the decoded JSON
 * error body, or `{ error: <raw text> }` when the body was not JSON.
 */
export function classifyErrorResponse(
  status: number,
  body: unknown,
  headers: HeaderLookup,
  endpoint?: string,
): ClassifiedError {
  const parsed = ErrorBodySchema.safeParse(body);
  const fields: z.infer<typeof ErrorBodySchema> = parsed.success ? parsed.data : {};
  const message = fields.error?.trim() ? fields.error : "Unknown error";

  switch (status) {
    case 400:
      return new ValidationError(message, fields.details, endpoint);
    case 401:
      return new AuthenticationError(message, endpoint);
    case 403:
      return new ForbiddenError(message, endpoint);
    case 404:
      return new NotFoundError(message, endpoint);
    case 409: {
      if (fields.outcome) {
        const outcome = TerminalOutcomeSchema.safeParse(fields.outcome);
        if (outcome.success) return new GameOverError(message, outcome.data, endpoint);
      }
      return new ConflictError(message, endpoint);
    }
    case 422:
      return new InvalidActionError(message, fields.code ?? "UNKNOWN", endpoint);
    case 429:
      return new RateLimitError(message, parseRetryAfter(headers.get("retry-after")), endpoint);
    default:
      return new ApiError(message, status, endpoint);
  }
}
