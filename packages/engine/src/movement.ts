import { Direction, type MovementData, type PlayerData } from "@ghostwalk/schemas";

// Pure geometry for drawing remote players over the engine's framebuffer.

export const SCREEN_WIDTH = 160;
export const SCREEN_HEIGHT = 144;
export const TILE_SIZE = 16;

/** Where the local player's sprite sits on screen; everyone else is drawn relative to it. */
export const SCREEN_ANCHOR = {
  x: SCREEN_WIDTH / 2 - 16,
  y: SCREEN_HEIGHT / 2 - 12,
} as const;

export interface Point {
  x: number;
  y: number;
}

export interface Offset {
  dx: number;
  dy: number;
}

export interface FrameSelection {
  index: number;
  /** Mirror the sprite horizontally. */
  flip: boolean;
}

/** Reads a facing byte from engine memory; anything unrecognised becomes `fallback`. */
export function toDirection(value: number, fallback: Direction = Direction.Down): Direction {
  switch (value) {
    case Direction.Down: return Direction.Down;
    case Direction.Up: return Direction.Up;
    case Direction.Left: return Direction.Left;
    case Direction.Right: return Direction.Right;
    default: return fallback;
  }
}

/**
 * Sub-tile offset while walking. The walk counter starts at 8 when a step begins and
 * the sprite moves 2px per tick until the counter hits 0 and the map coordinate updates.
 */
export function drawOffset(direction: Direction, walkCounter: number): Offset {
  if (walkCounter === 0) return { dx: 0, dy: 0 };
  const step = (8 - walkCounter) * 2;
  switch (direction) {
    case Direction.Down: return { dx: 0, dy: step };
    case Direction.Up: return { dx: 0, dy: -step };
    case Direction.Left: return { dx: -step, dy: 0 };
    case Direction.Right: return { dx: step, dy: 0 };
  }
}

export function frameIndex(direction: Direction, walkCounter: number): FrameSelection {
  let selection: FrameSelection;
  switch (direction) {
    case Direction.Up: selection = { index: 1, flip: false }; break;
    case Direction.Right: selection = { index: 2, flip: true }; break;
    case Direction.Left: selection = { index: 2, flip: false }; break;
    default: selection = { index: 0, flip: false }; break;
  }
  // Mid-stride frames follow the three standing frames in the sheet
  if (Math.floor(walkCounter / 4) === 1) selection.index += 3;
  return selection;
}

export function pixelPosition(player: PlayerData): Point {
  const { map_x, map_y, direction, walk_counter } = player.movement;
  const { dx, dy } = drawOffset(direction, walk_counter);
  return { x: map_x * TILE_SIZE + dx, y: map_y * TILE_SIZE + dy };
}

export function relativeDrawPosition(self: PlayerData, other: PlayerData): Point {
  const a = pixelPosition(self);
  const b = pixelPosition(other);
  return { x: b.x - a.x + SCREEN_ANCHOR.x, y: b.y - a.y + SCREEN_ANCHOR.y };
}

export function isVisibleTo(self: PlayerData, other: PlayerData): boolean {
  return self.movement.map_id === other.movement.map_id;
}

export function occupies(player: PlayerData, mapId: number, x: number, y: number): boolean {
  const m = player.movement;
  return m.map_id === mapId && m.map_x === x && m.map_y === y;
}

/** The tile one step ahead of `movement`, with the engine's 8-bit coordinate wrap. */
export function facingTile(movement: Pick<MovementData, "map_x" | "map_y" | "direction">): Point {
  let { map_x: x, map_y: y } = movement;
  switch (movement.direction) {
    case Direction.Down: y += 1; break;
    case Direction.Up: y -= 1; break;
    case Direction.Right: x += 1; break;
    case Direction.Left: x -= 1; break;
  }
  return { x: x & 0xff, y: y & 0xff };
}
