import { generateText, type LanguageModel, type ModelMessage } from "ai";
import {
  createLogger,
  describeAction,
  type Action,
  type DecisionFunction,
  type Logger,
  type Observation,
} from "@crawlerverse/sdk";
import { parseAgentReply } from "./parseReply.js";
import { SYSTEM_PROMPT, formatObservation } from "./prompt.js";

export interface LlmAgentOptions {
  model: LanguageModel;
  system?: string;
  temperature?: number;
  maxOutputTokens?: number;
  /**
   * Open the assistant turn with "{" so the model continues a JSON object.
   * Only providers that accept assistant prefill (Anthropic) should set this.
   */
  prefill?: boolean;
  /** Past exchanges kept in the conversation. */
  historyWindow?: number;
  logger?: Logger;
}

export const DEFAULT_HISTORY_WINDOW = 10;

/** A decision function that asks a language model for each turn's action. */
export function createLlmAgent(options: LlmAgentOptions): DecisionFunction {
  const {
    model,
    system = SYSTEM_PROMPT,
    temperature = 0.3,
    maxOutputTokens = 200,
    prefill = true,
    historyWindow = DEFAULT_HISTORY_WINDOW,
    logger = createLogger("agent"),
  } = options;

  const history: ModelMessage[] = [];

  return async (obs: Observation): Promise<Action> => {
    const prompt: ModelMessage = { role: "user", content: formatObservation(obs) };
    const messages: ModelMessage[] = prefill
      ? [...history, prompt, { role: "assistant", content: "{" }]
      : [...history, prompt];

    const result = await generateText({
      model,
      system,
      messages,
      temperature,
      maxOutputTokens,
    });

    const reply = prefill ? `{${result.text}` : result.text;
    history.push(prompt, { role: "assistant", content: reply });
    const keep = Math.max(0, historyWindow) * 2;
    if (history.length > keep) {
      history.splice(0, history.length - keep);
    }

    const action = parseAgentReply(reply, logger);
    logger.info(`Turn ${obs.turn}: ${describeAction(action)}`, { reasoning: action.reasoning });
    return action;
  };
}
