/**
 * @crawlerverse/agents
 *
 * Language-model agents for the Crawler Agent API, built on the AI SDK.
 *
 *   const decide = createLlmAgent({ model: resolveModel({ provider: "anthropic" }) });
 *   await runGame(new CrawlerClient(), decide, { modelId: "anthropic/claude-haiku-4-5-20251001" });
 */

export { SYSTEM_PROMPT, formatObservation } from "./prompt.js";
export { parseAgentReply } from "./parseReply.js";
export { DEFAULT_HISTORY_WINDOW, createLlmAgent, type LlmAgentOptions } from "./agent.js";
export {
  DEFAULT_LOCAL_BASE_URL,
  DEFAULT_MODELS,
  PROVIDERS,
  defaultModelId,
  isProviderName,
  resolveModel,
  supportsPrefill,
  type ModelSelection,
  type ProviderName,
} from "./providers.js";
export { DebugTracker, createDebugCallback, tileChar, type DebugTrackerOptions } from "./diagnostics.js";
export { USAGE, formatResult, parseArgv, runCli, type CliDeps, type Flags } from "./cli.js";
