import { describe, expect, it } from "vitest";
import {
  ApiError,
  DEFAULT_RETRY_AFTER_SECONDS,
  GameOverError,
  NotFoundError,
  ValidationError,
  classifyErrorResponse,
  isCrawlerApiError,
} from "../errors.js";

const noHeaders = new Headers();

describe("classifyErrorResponse", () => {
  const cases: Array<[number, string, string]> = [
    [400, "ValidationError", "validation"],
    [401, "AuthenticationError", "authentication"],
    [403, "ForbiddenError", "forbidden"],
    [404, "NotFoundError", "not_found"],
    [409, "ConflictError", "conflict"],
    [422, "InvalidActionError", "invalid_action"],
    [429, "RateLimitError", "rate_limit"],
    [500, "ApiError", "api"],
    [503, "ApiError", "api"],
  ];

  for (const [status, name, kind] of cases) {
    it(`maps ${status} to ${name}`, () => {
      const err = classifyErrorResponse(status, { error: "boom" }, noHeaders);
      expect(err.name).toBe(name);
      expect(err.kind).toBe(kind);
      expect(err.status).toBe(status);
      expect(err.message).toBe("boom");
    });
  }

  it("keeps 400 field details", () => {
    const err = classifyErrorResponse(
      400,
      { error: "Invalid request", details: { direction: ["Required"] } },
      noHeaders,
    );
    expect(err).toBeInstanceOf(ValidationError);
    if (err.kind !== "validation") throw new Error("expected validation");
    expect(err.details).toEqual({ direction: ["Required"] });
  });

  it("reads the 422 code and defaults it to UNKNOWN", () => {
    const withCode = classifyErrorResponse(422, { error: "Wall", code: "BLOCKED" }, noHeaders);
    const without = classifyErrorResponse(422, { error: "Wall" }, noHeaders);
    if (withCode.kind !== "invalid_action" || without.kind !== "invalid_action") {
      throw new Error("expected invalid_action");
    }
    expect(withCode.code).toBe("BLOCKED");
    expect(without.code).toBe("UNKNOWN");
  });

  it("reads retry-after seconds from the 429 headers", () => {
    const err = classifyErrorResponse(429, { error: "Slow down" }, new Headers({ "Retry-After": "5" }));
    if (err.kind !== "rate_limit") throw new Error("expected rate_limit");
    expect(err.retryAfter).toBe(5);
  });

  it("falls back to 60 seconds when retry-after is missing or unparsable", () => {
    const missing = classifyErrorResponse(429, {}, noHeaders);
    const garbage = classifyErrorResponse(429, {}, new Headers({ "Retry-After": "soon" }));
    if (missing.kind !== "rate_limit" || garbage.kind !== "rate_limit") {
      throw new Error("expected rate_limit");
    }
    expect(missing.retryAfter).toBe(DEFAULT_RETRY_AFTER_SECONDS);
    expect(garbage.retryAfter).toBe(60);
  });

  it("rejects retry-after values that are not whole seconds", () => {
    for (const raw of ["120abc", "5.9", "-3", " "]) {
      const err = classifyErrorResponse(429, {}, new Headers({ "Retry-After": raw }));
      if (err.kind !== "rate_limit") throw new Error("expected rate_limit");
      expect(err.retryAfter).toBe(60);
    }
  });

  it("turns a 409 with a terminal outcome into GameOverError", () => {
    const err = classifyErrorResponse(
      409,
      {
        error: "Game is already over",
        outcome: { status: "completed", result: "death", floor: 3, turns: 47 },
      },
      noHeaders,
    );
    expect(err).toBeInstanceOf(GameOverError);
    if (err.kind !== "game_over") throw new Error("expected game_over");
    expect(err.outcome).toEqual({ status: "completed", result: "death", floor: 3, turns: 47 });
  });

  it("keeps a 409 without a usable outcome as a plain conflict", () => {
    const none = classifyErrorResponse(409, { error: "Conflict" }, noHeaders);
    const inProgress = classifyErrorResponse(
      409,
      { error: "Conflict", outcome: { status: "in_progress" } },
      noHeaders,
    );
    const malformed = classifyErrorResponse(
      409,
      { error: "Conflict", outcome: { status: "completed" } },
      noHeaders,
    );
    expect(none.kind).toBe("conflict");
    expect(inProgress.kind).toBe("conflict");
    expect(malformed.kind).toBe("conflict");
  });

  it("uses 'Unknown error' when the body has no usable message", () => {
    expect(classifyErrorResponse(500, {}, noHeaders).message).toBe("Unknown error");
    expect(classifyErrorResponse(500, { error: 42 }, noHeaders).message).toBe("Unknown error");
    expect(classifyErrorResponse(500, "oops", noHeaders).message).toBe("Unknown error");
  });

  it("records the endpoint", () => {
    const err = classifyErrorResponse(404, { error: "Game not found" }, noHeaders, "GET /games/g1");
    expect(err.endpoint).toBe("GET /games/g1");
  });
});

describe("CrawlerApiError", () => {
  it("formats toString with the status", () => {
    const err = new NotFoundError("Game not found");
    expect(err.toString()).toBe("NotFoundError: 404: Game not found");
  });

  it("is recognised by isCrawlerApiError", () => {
    expect(isCrawlerApiError(new ApiError("x", 500))).toBe(true);
    expect(isCrawlerApiError(new Error("x"))).toBe(false);
    expect(isCrawlerApiError("x")).toBe(false);
  });
});
