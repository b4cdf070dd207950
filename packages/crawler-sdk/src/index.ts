/**
 * @crawlerverse/sdk
 *
 * TypeScript client for the Crawler Agent API: play the roguelike dungeon
 * crawler through HTTP, one action per turn.
 *
 * Required config:
 *   CRAWLERVERSE_API_KEY: Agent API key (or pass `apiKey` to the client)
 *
 * Optional config:
 *   CRAWLERVERSE_BASE_URL: defaults to https://crawlerver.se/api/agent
 *   CRAWLERVERSE_LOG_LEVEL: debug | info | warn | error | silent
 *
 * Quick start:
 *   const client = new CrawlerClient();
 *   const result = await runGame(client, () => wait(), { modelId: "my-agent" });
 */

export { SDK_VERSION, USER_AGENT } from "./version.js";

export {
  API_KEY_ENV,
  BASE_URL_ENV,
  DEBUG_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  LOG_LEVEL_ENV,
  getEnvValue,
  isDebugEnabled,
  resolveApiKey,
  resolveBaseUrl,
} from "./env.js";

export {
  createLogger,
  formatContext,
  parseLogLevel,
  type LogContext,
  type LogLevel,
  type LogSink,
  type Logger,
} from "./logger.js";

export * from "./types.js";
export * from "./actions.js";
export * from "./observation.js";
export * from "./errors.js";

export {
  CrawlerClient,
  GamesResource,
  unwrap,
  type ApiResult,
  type CrawlerClientOptions,
  type CreateGameOptions,
  type FetchLike,
  type ListGamesOptions,
} from "./client.js";

export {
  AgentError,
  DEFAULT_MAX_INVALID_ACTIONS,
  delay,
  runGame,
  type DecisionFunction,
  type GameTransport,
  type RunGameOptions,
  type StepCallback,
} from "./runner.js";
