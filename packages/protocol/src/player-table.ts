import type { MovementData, PlayerData, PlayerId } from "@ghostwalk/schemas";
import { clonePlayerData } from "@ghostwalk/schemas";

/** Remote players by id. The reconciliation client is the only writer. */
export class PlayerTable {
  private players = new Map<PlayerId, PlayerData>();

  get size(): number {
    return this.players.size;
  }

  get(id: PlayerId): PlayerData | undefined {
    return this.players.get(id);
  }

  has(id: PlayerId): boolean {
    return this.players.has(id);
  }

  upsert(data: PlayerData): void {
    this.players.set(data.player_id, clonePlayerData(data));
  }

  /** Replaces the movement of a known player. Unknown ids are not created. */
  updateMovement(id: PlayerId, movement: MovementData): boolean {
    const existing = this.players.get(id);
    if (!existing) return false;
    existing.movement = { ...movement };
    return true;
  }

  remove(id: PlayerId): boolean {
    return this.players.delete(id);
  }

  entries(): IterableIterator<[PlayerId, PlayerData]> {
    return this.players.entries();
  }

  values(): IterableIterator<PlayerData> {
    return this.players.values();
  }
}
