/**
 * Action model for POST /games/{id}/action.
 *
 * Nine variants discriminated by `action`. Fields are camelCase on the wire
 * (`itemType`) and absent fields are omitted, never sent as null.
 */

import * as z from "zod";
import { DirectionSchema, type Direction } from "./types.js";

const reasoning = z.string().optional();
const itemType = z.string().min(1);

export const MoveActionSchema = z.object({
  action: z.literal("move"),
  direction: DirectionSchema,
  reasoning,
});

export const AttackActionSchema = z.object({
  action: z.literal("attack"),
  direction: DirectionSchema,
  reasoning,
});

export const RangedAttackActionSchema = z.object({
  action: z.literal("ranged_attack"),
  direction: DirectionSchema,
  distance: z.number().int().positive(),
  reasoning,
});

export const PickupActionSchema = z.object({ action: z.literal("pickup"), reasoning });
export const DropActionSchema = z.object({ action: z.literal("drop"), itemType, reasoning });
export const UseActionSchema = z.object({ action: z.literal("use"), itemType, reasoning });
export const EquipActionSchema = z.object({ action: z.literal("equip"), itemType, reasoning });
export const WaitActionSchema = z.object({ action: z.literal("wait"), reasoning });
export const EnterPortalActionSchema = z.object({ action: z.literal("enter_portal"), reasoning });

export const ActionSchema = z.discriminatedUnion("action", [
  MoveActionSchema,
  AttackActionSchema,
  RangedAttackActionSchema,
  PickupActionSchema,
  DropActionSchema,
  UseActionSchema,
  EquipActionSchema,
  WaitActionSchema,
  EnterPortalActionSchema,
]);

export type MoveAction = z.infer<typeof MoveActionSchema>;
export type AttackAction = z.infer<typeof AttackActionSchema>;
export type RangedAttackAction = z.infer<typeof RangedAttackActionSchema>;
export type PickupAction = z.infer<typeof PickupActionSchema>;
export type DropAction = z.infer<typeof DropActionSchema>;
export type UseAction = z.infer<typeof UseActionSchema>;
export type EquipAction = z.infer<typeof EquipActionSchema>;
export type WaitAction = z.infer<typeof WaitActionSchema>;
export type EnterPortalAction = z.infer<typeof EnterPortalActionSchema>;
export type Action = z.infer<typeof ActionSchema>;
export type ActionType = Action["action"];

export const ACTION_TYPES: readonly ActionType[] = [
  "move",
  "attack",
  "ranged_attack",
  "pickup",
  "drop",
  "use",
  "equip",
  "wait",
  "enter_portal",
];

// ── Constructors ─────────────────────────────────────────────────
// Each one validates, so an empty itemType or a zero distance throws here
// instead of surfacing later as a 400 from the server.

function reasoningField(text?: string): { reasoning?: string } {
  return text === undefined ? {} : { reasoning: text };
}

export function move(direction: Direction, text?: string): MoveAction {
  return MoveActionSchema.parse({ action: "move", direction, ...reasoningField(text) });
}

export function attack(direction: Direction, text?: string): AttackAction {
  return AttackActionSchema.parse({ action: "attack", direction, ...reasoningField(text) });
}

export function rangedAttack(direction: Direction, distance: number, text?: string): RangedAttackAction {
  return RangedAttackActionSchema.parse(
    { action: "ranged_attack", direction, distance, ...reasoningField(text) },
  );
}

export function pickup(text?: string): PickupAction {
  return PickupActionSchema.parse({ action: "pickup", ...reasoningField(text) });
}

export function drop(item: string, text?: string): DropAction {
  return DropActionSchema.parse({ action: "drop", itemType: item, ...reasoningField(text) });
}

export function use(item: string, text?: string): UseAction {
  return UseActionSchema.parse({ action: "use", itemType: item, ...reasoningField(text) });
}

export function equip(item: string, text?: string): EquipAction {
  return EquipActionSchema.parse({ action: "equip", itemType: item, ...reasoningField(text) });
}

export function wait(text?: string): WaitAction {
  return WaitActionSchema.parse({ action: "wait", ...reasoningField(text) });
}

export function enterPortal(text?: string): EnterPortalAction {
  return EnterPortalActionSchema.parse({ action: "enter_portal", ...reasoningField(text) });
}

// ── Wire encoding ────────────────────────────────────────────────

export type SerializedAction = Record<string, string | number>;

export function serializeAction(action: Action): SerializedAction {
  const body: SerializedAction = {};
  for (const [key, value] of Object.entries(action)) {
    if (typeof value === "string" || typeof value === "number") {
      body[key] = value;
    }
  }
  return body;
}

export type ActionDecodeResult =
  | { ok: true; action: Action }
  | { ok: false; error: string };

function isActionType(value: unknown): value is ActionType {
  return typeof value === "string" && ACTION_TYPES.some((type) => type === value);
}

/**
 * Decode an untrusted object (e.g. parsed LLM output) into an Action.
 *
 * Null-valued fields count as absent. Unknown discriminators and missing or
 * malformed variant fields come back as `{ ok: false }`; choosing a fallback
 * is the caller's job.
 */
export function decodeAction(input: unknown): ActionDecodeResult {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return { ok: false, error: "Action must be a JSON object" };
  }

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== null && value !== undefined) fields[key] = value;
  }

  if (!isActionType(fields.action)) {
    return {
      ok: false,
      error: `Unknown action "${String(fields.action)}". Valid: ${ACTION_TYPES.join(", ")}`,
    };
  }

  const parsed = ActionSchema.safeParse(fields);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "action"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error: `Invalid ${fields.action} action (${issues})` };
  }
  return { ok: true, action: parsed.data };
}

export function describeAction(action: Action): string {
  switch (action.action) {
    case "move":
    case "attack":
      return `${action.action} ${action.direction}`;
    case "ranged_attack":
      return `ranged_attack ${action.direction} x${action.distance}`;
    case "drop":
    case "use":
    case "equip":
      return `${action.action} ${action.itemType}`;
    case "pickup":
    case "wait":
    case "enter_portal":
      return action.action;
  }
}
