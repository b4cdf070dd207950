/**
 * Read-only queries over an Observation.
 *
 * These never simulate game rules; canMove() only reflects what the
 * observation shows, and the server still decides.
 */

import type { Direction, Monster, Observation, TileType, VisibleTile } from "./types.js";

export const DIRECTION_OFFSETS: Readonly<Record<Direction, readonly [number, number]>> = {
  north: [0, -1],
  south: [0, 1],
  east: [1, 0],
  west: [-1, 0],
  northeast: [1, -1],
  northwest: [-1, -1],
  southeast: [1, 1],
  southwest: [-1, 1],
};

const WALKABLE_TILES: ReadonlySet<TileType> = new Set<TileType>([
  "floor",
  "door",
  "stairs_down",
  "stairs_up",
  "portal",
]);

export function tileAt(obs: Observation, x: number, y: number): VisibleTile | undefined {
  return obs.visibleTiles.find((tile) => tile.x === x && tile.y === y);
}

export function visibleMonsters(obs: Observation): Array<[VisibleTile, Monster]> {
  const found: Array<[VisibleTile, Monster]> = [];
  for (const tile of obs.visibleTiles) {
    if (tile.monster) found.push([tile, tile.monster]);
  }
  return found;
}

/** Closest monster by Manhattan distance; the first one seen wins ties. */
export function nearestMonster(obs: Observation): [VisibleTile, Monster] | undefined {
  const [px, py] = obs.player.position;
  let best: [VisibleTile, Monster] | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const entry of visibleMonsters(obs)) {
    const [tile] = entry;
    const distance = Math.abs(tile.x - px) + Math.abs(tile.y - py);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = entry;
    }
  }
  return best;
}

export function itemsAtFeet(obs: Observation): readonly string[] {
  const [px, py] = obs.player.position;
  return tileAt(obs, px, py)?.items ?? [];
}

export function hasItem(obs: Observation, name: string): boolean {
  const wanted = name.toLowerCase();
  return obs.inventory.some((item) => item.name.toLowerCase() === wanted);
}

/**
 * False when the target tile is unseen, holds a monster, or is not walkable.
 */
export function canMove(obs: Observation, direction: Direction): boolean {
  const [px, py] = obs.player.position;
  const [dx, dy] = DIRECTION_OFFSETS[direction];
  const tile = tileAt(obs, px + dx, py + dy);
  if (!tile) return false;
  if (tile.monster) return false;
  return WALKABLE_TILES.has(tile.type);
}

export function summarizeObservation(obs: Observation): string {
  const p = obs.player;
  const monsterCount = visibleMonsters(obs).length;
  const itemCount = obs.visibleTiles.reduce((sum, tile) => sum + tile.items.length, 0);
  const inventory = obs.inventory.map((item) => item.name).join(", ") || "empty";

  const lines = [
    `Turn ${obs.turn} | Floor ${obs.floor} | HP ${p.hp}/${p.maxHp} | Pos (${p.position[0]},${p.position[1]})`,
    `Inventory: ${inventory}`,
    `Visible: ${monsterCount} monsters, ${itemCount} items`,
  ];
  const lastMessage = obs.messages[obs.messages.length - 1];
  if (lastMessage !== undefined) {
    lines.push(`Messages: "${lastMessage}"`);
  }
  return lines.join("\n");
}
