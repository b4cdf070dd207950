/**
 * Turn loop for a single game.
 *
 * create (or resume) → decide → submit → repeat until the outcome is
 * terminal. Transport failures arrive as `ApiResult` values and are handled
 * by `error.kind`: rate limits sleep, invalid actions retry up to a
 * threshold, a 409 with an outcome ends the game normally, anything else is
 * thrown to the caller.
 */

import type { Action } from "./actions.js";
import { describeAction } from "./actions.js";
import type { ApiResult, CreateGameOptions } from "./client.js";
import { unwrap } from "./client.js";
import type { InvalidActionError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import {
  isTerminalOutcome,
  type ActionResponse,
  type CreateGameResponse,
  type GameResult,
  type GameStateResponse,
  type Observation,
} from "./types.js";

export const DEFAULT_MAX_INVALID_ACTIONS = 5;

/** The subset of CrawlerClient the runner drives. */
export interface GameTransport {
  readonly games: {
    start(options?: CreateGameOptions): Promise<ApiResult<CreateGameResponse>>;
    fetch(gameId: string): Promise<ApiResult<GameStateResponse>>;
    submit(gameId: string, action: Action): Promise<ApiResult<ActionResponse>>;
  };
}

export type DecisionFunction = (observation: Observation) => Action | Promise<Action>;

export type StepCallback = (observation: Observation, action: Action) => void | Promise<void>;

export interface RunGameOptions {
  /** Sent on creation only; ignored when resuming. */
  modelId?: string;
  /** Resume this game instead of creating a new one. */
  gameId?: string;
  maxInvalidActions?: number;
  /** Called once per accepted action with the observation the action was chosen from. */
  onStep?: StepCallback;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** The decision function threw. The original error is on `cause`. */
export class AgentError extends Error {
  readonly kind = "agent" as const;

  constructor(
    public readonly gameId: string,
    public readonly turn: number,
    options: { cause: unknown },
  ) {
    super(`Agent function failed [game=${gameId}, turn=${turn}]`, options);
    this.name = "AgentError";
  }
}

/** Longest delay a single timer accepts; longer ones fire immediately. */
const MAX_TIMER_MS = 2 ** 31 - 1;

/** Resolves after `ms`, split across timers when it exceeds one timer's range. */
export async function delay(ms: number): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const step = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, step));
    remaining -= step;
  }
}

export async function runGame(
  transport: GameTransport,
  decide: DecisionFunction,
  options: RunGameOptions = {},
): Promise<GameResult> {
  const maxInvalid = options.maxInvalidActions ?? DEFAULT_MAX_INVALID_ACTIONS;
  const sleep = options.sleep ?? delay;
  const log = options.logger ?? createLogger("runner");

  let gameId: string;
  let spectatorUrl: string;
  let current: Observation;

  if (options.gameId !== undefined) {
    gameId = options.gameId;
    spectatorUrl = "";
    const state = unwrap(await transport.games.fetch(gameId));
    if (isTerminalOutcome(state.outcome)) {
      log.info(`Game ${gameId} already over: ${state.outcome.status}`);
      return { gameId, spectatorUrl, outcome: state.outcome };
    }
    current = state.observation;
    log.info(`Game ${gameId} resumed`, { turn: current.turn });
  } else {
    const created = unwrap(
      await transport.games.start(options.modelId !== undefined ? { modelId: options.modelId } : {}),
    );
    gameId = created.gameId;
    spectatorUrl = created.spectatorUrl;
    current = created.observation;
    log.info(`Game ${gameId} started. Watch: ${spectatorUrl}`);
  }

  let consecutiveInvalid = 0;

  for (;;) {
    let action: Action;
    try {
      action = await decide(current);
    } catch (err) {
      throw new AgentError(gameId, current.turn, { cause: err });
    }

    const result = await transport.games.submit(gameId, action);

    if (result.ok) {
      consecutiveInvalid = 0;
      if (options.onStep) {
        await options.onStep(current, action);
      }
      current = result.value.observation;
      const outcome = result.value.outcome;
      if (isTerminalOutcome(outcome)) {
        log.info(`Game ${gameId} finished: ${outcome.status}`, {
          floor: outcome.floor,
          turns: outcome.turns,
        });
        return { gameId, spectatorUrl, outcome };
      }
      continue;
    }

    const error = result.error;
    switch (error.kind) {
      case "invalid_action": {
        consecutiveInvalid += 1;
        logInvalid(log, error, consecutiveInvalid, maxInvalid, gameId, current.turn, action);
        if (consecutiveInvalid >= maxInvalid) throw error;
        break;
      }
      case "rate_limit": {
        log.warn(`Rate limited. Sleeping ${error.retryAfter} seconds.`, {
          game: gameId,
          turn: current.turn,
        });
        await sleep(error.retryAfter * 1000);
        break;
      }
      case "game_over": {
        log.info(`Game ${gameId} ended between turns: ${error.outcome.status}`);
        return { gameId, spectatorUrl, outcome: error.outcome };
      }
      default:
        throw error;
    }
  }
}

function logInvalid(
  log: Logger,
  error: InvalidActionError,
  count: number,
  max: number,
  gameId: string,
  turn: number,
  action: Action,
): void {
  log.warn(`Invalid action (${count}/${max}): ${error.message}`, {
    code: error.code,
    game: gameId,
    turn,
    action: describeAction(action),
  });
}
