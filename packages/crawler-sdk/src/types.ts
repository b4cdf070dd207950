/**
 * Wire schemas and decoded types for the Crawler Agent API.
 *
 * Every shape is camelCase on the wire and decoded through zod. Decoded
 * values are frozen: an Observation is replaced each turn, never patched.
 */

import * as z from "zod";

// ── Enumerations ─────────────────────────────────────────────────

export const DIRECTIONS = [
  "north",
  "south",
  "east",
  "west",
  "northeast",
  "northwest",
  "southeast",
  "southwest",
] as const;

export const DirectionSchema = z.enum(DIRECTIONS);
export type Direction = z.infer<typeof DirectionSchema>;

export const TileTypeSchema = z.enum([
  "floor",
  "wall",
  "stairs_down",
  "stairs_up",
  "door",
  "portal",
]);
export type TileType = z.infer<typeof TileTypeSchema>;

export const GameStatusSchema = z.enum(["in_progress", "completed", "abandoned"]);
export type GameStatus = z.infer<typeof GameStatusSchema>;

// ── Observation ──────────────────────────────────────────────────

export const MonsterSchema = z
  .object({
    type: z.string(),
    hp: z.number().int(),
    maxHp: z.number().int(),
  })
  .readonly();

export const VisibleTileSchema = z
  .object({
    x: z.number().int(),
    y: z.number().int(),
    type: TileTypeSchema,
    items: z.array(z.string()).readonly(),
    monster: MonsterSchema.nullish(),
  })
  .readonly();

export const InventoryItemSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    name: z.string(),
  })
  .readonly();

export const PlayerSchema = z
  .object({
    position: z.tuple([z.number().int(), z.number().int()]).readonly(),
    hp: z.number().int(),
    maxHp: z.number().int(),
    attack: z.number().int(),
    defense: z.number().int(),
    equippedWeapon: z.string().nullish(),
    equippedArmor: z.string().nullish(),
  })
  .readonly();

export const ObservationSchema = z
  .object({
    turn: z.number().int().nonnegative(),
    floor: z.number().int(),
    player: PlayerSchema,
    inventory: z.array(InventoryItemSchema).readonly(),
    visibleTiles: z.array(VisibleTileSchema).readonly(),
    messages: z.array(z.string()).readonly(),
  })
  .readonly();

export type Monster = z.infer<typeof MonsterSchema>;
export type VisibleTile = z.infer<typeof VisibleTileSchema>;
export type InventoryItem = z.infer<typeof InventoryItemSchema>;
export type Player = z.infer<typeof PlayerSchema>;
export type Observation = z.infer<typeof ObservationSchema>;

// ── Outcome ──────────────────────────────────────────────────────

const InProgressOutcomeShape = z.object({ status: z.literal("in_progress") });

const CompletedOutcomeShape = z.object({
  status: z.literal("completed"),
  result: z.enum(["victory", "death"]),
  floor: z.number().int(),
  turns: z.number().int(),
});

const AbandonedOutcomeShape = z.object({
  status: z.literal("abandoned"),
  reason: z.enum(["timeout", "disconnected"]),
  floor: z.number().int(),
  turns: z.number().int(),
});

export const OutcomeSchema = z
  .discriminatedUnion("status", [
    InProgressOutcomeShape,
    CompletedOutcomeShape,
    AbandonedOutcomeShape,
  ])
  .readonly();

export const TerminalOutcomeSchema = z
  .discriminatedUnion("status", [CompletedOutcomeShape, AbandonedOutcomeShape])
  .readonly();

export type Outcome = z.infer<typeof OutcomeSchema>;
export type TerminalOutcome = z.infer<typeof TerminalOutcomeSchema>;
export type InProgressOutcome = Extract<Outcome, { status: "in_progress" }>;
export type CompletedOutcome = Extract<Outcome, { status: "completed" }>;
export type AbandonedOutcome = Extract<Outcome, { status: "abandoned" }>;

export function parseOutcome(data: unknown): Outcome {
  return OutcomeSchema.parse(data);
}

export function isTerminalOutcome(outcome: Outcome): outcome is TerminalOutcome {
  return outcome.status !== "in_progress";
}

// ── Responses ────────────────────────────────────────────────────

export const CreateGameResponseSchema = z
  .object({
    gameId: z.string(),
    observation: ObservationSchema,
    spectatorUrl: z.string(),
  })
  .readonly();

export const GameStateResponseSchema = z
  .object({
    observation: ObservationSchema,
    outcome: OutcomeSchema,
  })
  .readonly();

/** POST /games/{id}/action carries the same shape as GET /games/{id}. */
export const ActionResponseSchema = GameStateResponseSchema;

export const GameSummarySchema = z
  .object({
    gameId: z.string(),
    status: GameStatusSchema,
    modelId: z.string().nullish(),
    floorReached: z.number().int(),
    totalTurns: z.number().int(),
    result: z.enum(["victory", "death"]).nullish(),
    startedAt: z.coerce.date(),
    finishedAt: z.coerce.date().nullish(),
    spectatorUrl: z.string(),
  })
  .readonly();

export const ListGamesResponseSchema = z
  .object({
    games: z.array(GameSummarySchema).readonly(),
    hasMore: z.boolean(),
  })
  .readonly();

export const AbandonGameResponseSchema = z
  .object({
    gameId: z.string(),
    status: z.string(),
    floor: z.number().int(),
    turns: z.number().int(),
  })
  .readonly();

export const HealthResponseSchema = z
  .object({
    status: z.string(),
    service: z.string(),
    timestamp: z.coerce.date(),
  })
  .readonly();

export type CreateGameResponse = z.infer<typeof CreateGameResponseSchema>;
export type GameStateResponse = z.infer<typeof GameStateResponseSchema>;
export type ActionResponse = z.infer<typeof ActionResponseSchema>;
export type GameSummary = z.infer<typeof GameSummarySchema>;
export type ListGamesResponse = z.infer<typeof ListGamesResponseSchema>;
export type AbandonGameResponse = z.infer<typeof AbandonGameResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

// ── Runner result ────────────────────────────────────────────────

/** Returned by runGame(). spectatorUrl is "" when the game was resumed. */
export type GameResult = Readonly<{
  gameId: string;
  spectatorUrl: string;
  outcome: TerminalOutcome;
}>;
