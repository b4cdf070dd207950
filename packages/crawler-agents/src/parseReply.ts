import { createLogger, decodeAction, wait, type Action, type Logger } from "@crawlerverse/sdk";

function stripFences(raw: string): string {
  let text = raw.trim();
  if (text.startsWith("```")) {
    const newline = text.indexOf("\n");
    text = newline >= 0 ? text.slice(newline + 1) : text.slice(3);
  }
  if (text.endsWith("```")) {
    text = text.slice(0, -3);
  }
  return text.trim();
}

function extractObject(text: string): string {
  if (text.startsWith("{")) return text;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start >= 0 && end > start ? text.slice(start, end + 1) : text;
}

/**
 * Turn a model reply into an Action. Never throws: anything unreadable
 * becomes `wait` with a reasoning that says what went wrong.
 */
export function parseAgentReply(raw: string, logger: Logger = createLogger("agent")): Action {
  const text = extractObject(stripFences(raw));

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    logger.warn(`Failed to parse model reply as JSON: ${text.slice(0, 100)}`);
    return wait("Failed to parse response");
  }

  if (data && typeof data === "object" && !Array.isArray(data) && "item_type" in data) {
    const { item_type: alias, ...rest } = data;
    data = "itemType" in rest ? rest : { ...rest, itemType: alias };
  }

  const decoded = decodeAction(data);
  if (decoded.ok) return decoded.action;

  logger.warn(decoded.error);
  return wait(decoded.error);
}
