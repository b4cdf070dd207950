/**
 * Move diagnostics for agent debugging, enabled with CRAWLERVERSE_DEBUG=1.
 *
 * Flags moves into blocked tiles, positions that moved by something other
 * than the chosen direction, and movement after a non-move action. Every
 * move also prints a 5x5 map around the player.
 */

import {
  DIRECTION_OFFSETS,
  canMove,
  isDebugEnabled,
  tileAt,
  type Action,
  type Direction,
  type Observation,
  type StepCallback,
  type TileType,
  type VisibleTile,
} from "@crawlerverse/sdk";

const TILE_CHARS: Record<TileType, string> = {
  wall: "#",
  floor: ".",
  door: "+",
  stairs_down: ">",
  stairs_up: "<",
  portal: "%",
};

export function tileChar(tile: VisibleTile | undefined): string {
  if (!tile) return "?";
  if (tile.monster) return "M";
  return TILE_CHARS[tile.type];
}

type Position = readonly [number, number];

const fmt = (pos: Position) => `(${pos[0]},${pos[1]})`;

export interface DebugTrackerOptions {
  enabled?: boolean;
  print?: (line: string) => void;
}

export class DebugTracker {
  readonly enabled: boolean;
  private readonly print: (line: string) => void;
  private prevPos: Position | null = null;
  private prevAction: Action["action"] | null = null;
  private prevDirection: Direction | null = null;

  constructor(options: DebugTrackerOptions = {}) {
    this.enabled = options.enabled ?? isDebugEnabled();
    this.print = options.print ?? ((line) => console.log(line));
  }

  /** Call with the observation the action was chosen from, before submitting. */
  onAction(obs: Observation, action: Action): void {
    if (!this.enabled) return;

    this.checkPosition(obs);

    if (action.action !== "move") {
      this.prevPos = obs.player.position;
      this.prevAction = action.action;
      this.prevDirection = null;
      return;
    }

    const [px, py] = obs.player.position;
    const { direction } = action;
    this.printGrid(obs, px, py, direction);

    const [dx, dy] = DIRECTION_OFFSETS[direction];
    const target = tileAt(obs, px + dx, py + dy);
    let targetDesc = "NOT VISIBLE";
    if (target) {
      targetDesc = target.monster ? `${target.type} [monster: ${target.monster.type}]` : target.type;
    }
    const can = canMove(obs, direction);
    this.print(`  [DIAG] Target (${px + dx},${py + dy}): ${targetDesc} | canMove(${direction})=${can}`);
    if (!can) {
      this.print("  [DIAG] *** INVALID MOVE *** agent chose a blocked direction");
    }

    this.prevPos = obs.player.position;
    this.prevAction = "move";
    this.prevDirection = direction;
  }

  /** Optional: check the post-action observation right away. */
  onResult(obs: Observation): void {
    if (!this.enabled) return;
    this.checkPosition(obs);
  }

  private checkPosition(obs: Observation): void {
    if (!this.prevPos) return;

    const pos = obs.player.position;
    const dx = pos[0] - this.prevPos[0];
    const dy = pos[1] - this.prevPos[1];

    if (this.prevAction === "move" && this.prevDirection) {
      const [ex, ey] = DIRECTION_OFFSETS[this.prevDirection];
      if ((dx === ex && dy === ey) || (dx === 0 && dy === 0)) return;
      this.print(
        `  [DIAG] *** POSITION MISMATCH *** prev=${fmt(this.prevPos)} action=move ${this.prevDirection} ` +
          `expected delta=(${ex},${ey}) actual delta=(${dx},${dy}) new pos=${fmt(pos)}`,
      );
    } else if (this.prevAction !== "move" && (dx !== 0 || dy !== 0)) {
      this.print(
        `  [DIAG] *** UNEXPECTED MOVEMENT *** prev=${fmt(this.prevPos)} action=${this.prevAction} ` +
          `but position changed by (${dx},${dy}) to ${fmt(pos)}`,
      );
    }
  }

  private printGrid(obs: Observation, px: number, py: number, direction: Direction): void {
    this.print(`  [DIAG] Player at (${px},${py}), wants to move ${direction}`);
    this.print("  [DIAG] Local map (@ = player, # = wall, . = floor, M = monster, ? = unseen):");
    for (let dy = -2; dy <= 2; dy++) {
      let row = "";
      for (let dx = -2; dx <= 2; dx++) {
        row += dx === 0 && dy === 0 ? " @" : ` ${tileChar(tileAt(obs, px + dx, py + dy))}`;
      }
      this.print(`  [DIAG]  ${row}`);
    }
  }
}

/**
 * `onStep` callback for runGame, or undefined when diagnostics are off.
 * runGame passes the observation from before the action.
 */
export function createDebugCallback(options: DebugTrackerOptions = {}): StepCallback | undefined {
  const tracker = new DebugTracker(options);
  if (!tracker.enabled) return undefined;
  return (obs, action) => tracker.onAction(obs, action);
}
