import { DIRECTIONS, canMove, type Observation } from "@crawlerverse/sdk";

export const SYSTEM_PROMPT = `You are an AI agent playing Crawler, a roguelike dungeon game.
Each turn you receive an observation and must choose ONE action.
Respond with a JSON object (no markdown, no explanation).

## Actions
  {"action": "move", "direction": "<dir>"}
  {"action": "attack", "direction": "<dir>"}
  {"action": "ranged_attack", "direction": "<dir>", "distance": <1-15>}
  {"action": "pickup"}
  {"action": "drop", "itemType": "<item>"}
  {"action": "use", "itemType": "<item>"}
  {"action": "equip", "itemType": "<item>"}
  {"action": "wait"}
  {"action": "enter_portal"}

Directions: ${DIRECTIONS.join(", ")}

## Strategy Tips
- Kill monsters to clear the path. Attack adjacent monsters.
- Pick up items (potions, weapons, armor) to survive longer.
- Equip weapons and armor for better stats.
- Use health potions when HP is low.
- Find stairs down to descend to the next floor.
- Explore systematically; avoid getting surrounded.

Always include a "reasoning" field explaining your decision.`;

/** Full per-turn prompt: stats, passable directions, every visible tile, messages. */
export function formatObservation(obs: Observation): string {
  const p = obs.player;
  const lines = [
    `Turn ${obs.turn} | Floor ${obs.floor}`,
    `HP: ${p.hp}/${p.maxHp} | ATK: ${p.attack} | DEF: ${p.defense}`,
    `Position: (${p.position[0]}, ${p.position[1]})`,
  ];

  if (p.equippedWeapon) lines.push(`Weapon: ${p.equippedWeapon}`);
  if (p.equippedArmor) lines.push(`Armor: ${p.equippedArmor}`);

  if (obs.inventory.length > 0) {
    lines.push(`Inventory: ${obs.inventory.map((item) => `${item.name} (${item.type})`).join(", ")}`);
  }

  const passable = DIRECTIONS.filter((direction) => canMove(obs, direction));
  lines.push(`Passable directions: ${passable.length > 0 ? passable.join(", ") : "none"}`);

  lines.push("", "Visible tiles:");
  for (const tile of obs.visibleTiles) {
    const parts = [`  (${tile.x},${tile.y}) ${tile.type}`];
    if (tile.monster) {
      parts.push(`[MONSTER: ${tile.monster.type} HP:${tile.monster.hp}/${tile.monster.maxHp}]`);
    }
    if (tile.items.length > 0) {
      parts.push(`[ITEMS: ${tile.items.join(", ")}]`);
    }
    lines.push(parts.join(" "));
  }

  if (obs.messages.length > 0) {
    lines.push("", "Messages:");
    for (const message of obs.messages) {
      lines.push(`  ${message}`);
    }
  }

  return lines.join("\n");
}
