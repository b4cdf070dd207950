import { describe, expect, it } from "vitest";
import {
  attack,
  decodeAction,
  describeAction,
  drop,
  enterPortal,
  equip,
  move,
  pickup,
  rangedAttack,
  serializeAction,
  use,
  wait,
} from "../actions.js";

describe("action constructors", () => {
  it("builds the wire shape for each variant", () => {
    expect(move("north")).toEqual({ action: "move", direction: "north" });
    expect(attack("east", "rat adjacent")).toEqual({
      action: "attack",
      direction: "east",
      reasoning: "rat adjacent",
    });
    expect(rangedAttack("west", 3)).toEqual({ action: "ranged_attack", direction: "west", distance: 3 });
    expect(pickup()).toEqual({ action: "pickup" });
    expect(drop("rock")).toEqual({ action: "drop", itemType: "rock" });
    expect(use("health-potion")).toEqual({ action: "use", itemType: "health-potion" });
    expect(equip("iron-sword")).toEqual({ action: "equip", itemType: "iron-sword" });
    expect(wait()).toEqual({ action: "wait" });
    expect(enterPortal()).toEqual({ action: "enter_portal" });
  });

  it("rejects a non-positive distance", () => {
    expect(() => rangedAttack("north", 0)).toThrow();
    expect(() => rangedAttack("north", 1.5)).toThrow();
  });

  it("rejects an empty item type", () => {
    expect(() => use("")).toThrow();
  });
});

describe("serializeAction", () => {
  it("omits absent reasoning instead of sending null", () => {
    expect(serializeAction(wait())).toEqual({ action: "wait" });
    expect(JSON.stringify(serializeAction(move("south")))).toBe('{"action":"move","direction":"south"}');
  });

  it("keeps camelCase itemType and reasoning", () => {
    expect(serializeAction(use("health-potion", "low hp"))).toEqual({
      action: "use",
      itemType: "health-potion",
      reasoning: "low hp",
    });
  });
});

describe("decodeAction", () => {
  it("decodes a valid object", () => {
    expect(decodeAction({ action: "attack", direction: "north", reasoning: "kill" })).toEqual({
      ok: true,
      action: { action: "attack", direction: "north", reasoning: "kill" },
    });
  });

  it("treats null fields as absent", () => {
    expect(decodeAction({ action: "wait", reasoning: null })).toEqual({
      ok: true,
      action: { action: "wait" },
    });
  });

  it("rejects non-objects", () => {
    expect(decodeAction("wait")).toEqual({ ok: false, error: "Action must be a JSON object" });
    expect(decodeAction(null)).toEqual({ ok: false, error: "Action must be a JSON object" });
    expect(decodeAction([])).toEqual({ ok: false, error: "Action must be a JSON object" });
  });

  it("rejects an unknown discriminator with the valid list", () => {
    expect(decodeAction({ action: "dance" })).toEqual({
      ok: false,
      error:
        'Unknown action "dance". Valid: move, attack, ranged_attack, pickup, drop, use, equip, wait, enter_portal',
    });
  });

  it("rejects a variant missing its required field", () => {
    const result = decodeAction({ action: "move" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatch(/^Invalid move action \(direction: /);
  });

  it("rejects an unknown direction", () => {
    const result = decodeAction({ action: "move", direction: "up" });
    expect(result.ok).toBe(false);
  });
});

describe("describeAction", () => {
  it("renders a short label", () => {
    expect(describeAction(move("north"))).toBe("move north");
    expect(describeAction(rangedAttack("east", 3))).toBe("ranged_attack east x3");
    expect(describeAction(use("health-potion"))).toBe("use health-potion");
    expect(describeAction(wait())).toBe("wait");
  });
});
