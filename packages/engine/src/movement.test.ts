import { describe, it, expect } from "vitest";
import { Direction, type PlayerData } from "@ghostwalk/schemas";
import {
  SCREEN_ANCHOR, drawOffset, frameIndex, pixelPosition, relativeDrawPosition,
  isVisibleTo, occupies, facingTile, toDirection,
} from "./movement.js";

function player(mapId: number, x: number, y: number, direction = Direction.Down, walkCounter = 0): PlayerData {
  return {
    player_id: 1,
    name: [],
    movement: { map_id: mapId, map_x: x, map_y: y, direction, walk_counter: walkCounter },
  };
}

describe("drawOffset", () => {
  it("is zero while standing", () => {
    expect(drawOffset(Direction.Left, 0)).toEqual({ dx: 0, dy: 0 });
  });

  it("moves 2px per tick along the facing axis", () => {
    expect(drawOffset(Direction.Down, 6)).toEqual({ dx: 0, dy: 4 });
    expect(drawOffset(Direction.Up, 6)).toEqual({ dx: 0, dy: -4 });
    expect(drawOffset(Direction.Left, 2)).toEqual({ dx: -12, dy: 0 });
    expect(drawOffset(Direction.Right, 1)).toEqual({ dx: 14, dy: 0 });
  });
});

describe("frameIndex", () => {
  it("selects the standing frame per direction", () => {
    expect(frameIndex(Direction.Down, 0)).toEqual({ index: 0, flip: false });
    expect(frameIndex(Direction.Up, 0)).toEqual({ index: 1, flip: false });
    expect(frameIndex(Direction.Left, 3)).toEqual({ index: 2, flip: false });
    expect(frameIndex(Direction.Right, 3)).toEqual({ index: 2, flip: true });
  });

  it("switches to the stride frame for walk counters 4 to 7", () => {
    expect(frameIndex(Direction.Up, 4)).toEqual({ index: 4, flip: false });
    expect(frameIndex(Direction.Right, 7)).toEqual({ index: 5, flip: true });
    expect(frameIndex(Direction.Down, 8)).toEqual({ index: 0, flip: false });
  });
});

describe("positions", () => {
  it("converts tiles to pixels with the walk offset", () => {
    expect(pixelPosition(player(1, 3, 5, Direction.Down, 6))).toEqual({ x: 48, y: 84 });
  });

  it("anchors the local player at the screen anchor", () => {
    const self = player(1, 10, 10);
    expect(relativeDrawPosition(self, player(1, 10, 10))).toEqual(SCREEN_ANCHOR);
    expect(SCREEN_ANCHOR).toEqual({ x: 64, y: 60 });
  });

  it("draws peers relative to the local player", () => {
    expect(relativeDrawPosition(player(1, 10, 10), player(1, 12, 9))).toEqual({ x: 96, y: 44 });
  });

  it("only shows peers on the same map", () => {
    expect(isVisibleTo(player(1, 0, 0), player(1, 9, 9))).toBe(true);
    expect(isVisibleTo(player(1, 0, 0), player(2, 0, 0))).toBe(false);
  });
});

describe("occupies", () => {
  it("requires map and tile to match", () => {
    const p = player(3, 5, 4);
    expect(occupies(p, 3, 5, 4)).toBe(true);
    expect(occupies(p, 2, 5, 4)).toBe(false);
    expect(occupies(p, 3, 4, 5)).toBe(false);
  });
});

describe("facingTile", () => {
  it("steps one tile in the facing direction", () => {
    expect(facingTile({ map_x: 5, map_y: 5, direction: Direction.Down })).toEqual({ x: 5, y: 6 });
    expect(facingTile({ map_x: 5, map_y: 5, direction: Direction.Up })).toEqual({ x: 5, y: 4 });
    expect(facingTile({ map_x: 5, map_y: 5, direction: Direction.Right })).toEqual({ x: 6, y: 5 });
    expect(facingTile({ map_x: 5, map_y: 5, direction: Direction.Left })).toEqual({ x: 4, y: 5 });
  });

  it("wraps like a byte", () => {
    expect(facingTile({ map_x: 0, map_y: 0, direction: Direction.Up })).toEqual({ x: 0, y: 255 });
    expect(facingTile({ map_x: 255, map_y: 0, direction: Direction.Right })).toEqual({ x: 0, y: 0 });
  });
});

describe("toDirection", () => {
  it("reads the engine encoding and defaults to Down", () => {
    expect(toDirection(0x0c)).toBe(Direction.Right);
    expect(toDirection(0x04)).toBe(Direction.Up);
    expect(toDirection(0x02)).toBe(Direction.Down);
  });

  it("returns the caller's fallback for an unknown byte", () => {
    expect(toDirection(0x02, Direction.Left)).toBe(Direction.Left);
    expect(toDirection(0x00, Direction.Left)).toBe(Direction.Down);
  });
});
