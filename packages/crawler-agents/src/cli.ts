import type { LanguageModel } from "ai";
import {
  CrawlerClient,
  DEFAULT_MAX_INVALID_ACTIONS,
  getEnvValue,
  runGame,
  type GameResult,
  type GameTransport,
} from "@crawlerverse/sdk";
import { createLlmAgent } from "./agent.js";
import { createDebugCallback } from "./diagnostics.js";
import {
  PROVIDERS,
  defaultModelId,
  isProviderName,
  resolveModel,
  supportsPrefill,
} from "./providers.js";

export const USAGE = `Usage: crawler-agent [options]

  --provider=<name>      anthropic | openai | local (default: anthropic)
  --model=<name>         model name for the provider
  --model-id=<id>        leaderboard id (default: <provider>/<model>)
  --game-id=<id>         resume an existing game (or set GAME_ID)
  --base-url=<url>       Crawler Agent API base URL
  --max-invalid=<n>      consecutive invalid actions before giving up (default: ${DEFAULT_MAX_INVALID_ACTIONS})
  --help                 show this message`;

export type Flags = Record<string, string | boolean>;

export function parseArgv(argv: readonly string[]): Flags {
  const out: Flags = {};
  for (const raw of argv) {
    if (!raw.startsWith("--")) continue;
    const arg = raw.slice(2);
    if (!arg) continue;
    const eq = arg.indexOf("=");
    if (eq === -1) {
      out[arg] = true;
      continue;
    }
    out[arg.slice(0, eq)] = arg.slice(eq + 1);
  }
  return out;
}

function getStringFlag(flags: Flags, key: string) {
  const v = flags[key];
  return typeof v === "string" && v.trim() ? v.trim() : undefined;
}

function getPositiveIntFlag(flags: Flags, key: string) {
  const raw = getStringFlag(flags, key);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : null;
}

export function formatResult(result: GameResult): string[] {
  const { outcome } = result;
  const lines = [
    `Game over! ${outcome.status}`,
    `  Floor reached: ${outcome.floor}`,
    `  Total turns: ${outcome.turns}`,
    outcome.status === "completed" ? `  Result: ${outcome.result}` : `  Reason: ${outcome.reason}`,
  ];
  if (result.spectatorUrl) lines.push(`  Watch replay: ${result.spectatorUrl}`);
  return lines;
}

export interface CliDeps {
  transport?: GameTransport;
  model?: LanguageModel;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

/** Runs one game. Resolves to the exit code: 0 victory, 1 any other ending, 2 error. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const flags = parseArgv(argv);

  if (flags.help) {
    print(USAGE);
    return 0;
  }

  const provider = getStringFlag(flags, "provider") ?? "anthropic";
  if (!isProviderName(provider)) {
    printError(`Unknown provider "${provider}". Valid: ${PROVIDERS.join(", ")}`);
    return 2;
  }
  const maxInvalidActions = getPositiveIntFlag(flags, "max-invalid");
  if (maxInvalidActions === null) {
    printError("--max-invalid must be a positive integer");
    return 2;
  }

  const selection = { provider, model: getStringFlag(flags, "model") };
  const modelId = getStringFlag(flags, "model-id") ?? defaultModelId(selection);
  const gameId = getStringFlag(flags, "game-id") ?? (getEnvValue("GAME_ID")?.trim() || undefined);

  try {
    const transport =
      deps.transport ?? new CrawlerClient({ baseUrl: getStringFlag(flags, "base-url") });
    const decide = createLlmAgent({
      model: deps.model ?? resolveModel(selection),
      prefill: supportsPrefill(provider),
    });

    print(gameId ? `Resuming game: ${gameId}` : `Starting game (leaderboard ID: ${modelId})`);

    const result = await runGame(transport, decide, {
      modelId,
      gameId,
      maxInvalidActions,
      onStep: createDebugCallback(),
    });

    print("");
    for (const line of formatResult(result)) print(line);
    return result.outcome.status === "completed" && result.outcome.result === "victory" ? 0 : 1;
  } catch (err) {
    printError(`Error: ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof Error && err.cause instanceof Error) {
      printError(`  caused by: ${err.cause.message}`);
    }
    return 2;
  }
}
