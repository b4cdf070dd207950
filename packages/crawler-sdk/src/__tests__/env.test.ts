import { afterEach, describe, expect, it, vi } from "vitest";
import { isDebugEnabled, resolveApiKey, resolveBaseUrl } from "../env.js";
import { AuthenticationError } from "../errors.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("env", () => {
  it("prefers an explicit API key over the environment", () => {
    vi.stubEnv("CRAWLERVERSE_API_KEY", "env-secret");
    expect(resolveApiKey("test-secret")).toBe("test-secret");
    expect(resolveApiKey()).toBe("env-secret");
  });

  it("throws AuthenticationError without any key", () => {
    vi.stubEnv("CRAWLERVERSE_API_KEY", "");
    expect(() => resolveApiKey()).toThrow(AuthenticationError);
    expect(() => resolveApiKey()).toThrow(
      "No API key provided. Pass apiKey or set the CRAWLERVERSE_API_KEY environment variable.",
    );
  });

  it("defaults the base URL and trims trailing slashes", () => {
    vi.stubEnv("CRAWLERVERSE_BASE_URL", "");
    expect(resolveBaseUrl()).toBe("https://crawlerver.se/api/agent");
    expect(resolveBaseUrl("http://localhost:3000/api/agent//")).toBe("http://localhost:3000/api/agent");
  });

  it("reads the debug flag", () => {
    vi.stubEnv("CRAWLERVERSE_DEBUG", "true");
    expect(isDebugEnabled()).toBe(true);
    vi.stubEnv("CRAWLERVERSE_DEBUG", "0");
    expect(isDebugEnabled()).toBe(false);
  });
});
