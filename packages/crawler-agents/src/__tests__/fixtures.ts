import { ObservationSchema, createLogger, type Observation } from "@crawlerverse/sdk";
import { MockLanguageModelV2 } from "ai/test";

export function makeObservation(overrides: Record<string, unknown> = {}): Observation {
  return ObservationSchema.parse({
    turn: 47,
    floor: 3,
    player: {
      position: [5, 8],
      hp: 12,
      maxHp: 20,
      attack: 8,
      defense: 4,
      equippedWeapon: "iron-sword",
    },
    inventory: [
      { id: "item-1", type: "potion", name: "Health Potion" },
      { id: "item-2", type: "scroll", name: "Scroll of Light" },
    ],
    visibleTiles: [
      { x: 6, y: 8, type: "floor", items: [], monster: { type: "rat", hp: 3, maxHp: 5 } },
      { x: 5, y: 7, type: "wall", items: [] },
      { x: 5, y: 8, type: "floor", items: ["gold-coin", "health-potion"] },
    ],
    messages: ["The rat bites you for 3 damage", "You attack the rat"],
    ...overrides,
  });
}

export const silent = createLogger("test", { level: "silent" });

/** A model that answers each call with the next reply. */
export function scriptedModel(replies: string[]) {
  const queue = [...replies];
  return new MockLanguageModelV2({
    doGenerate: async () => ({
      content: [{ type: "text", text: queue.shift() ?? '{"action": "wait"}' }],
      finishReason: "stop",
      usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
      warnings: [],
    }),
  });
}
