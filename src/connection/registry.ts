import type { Room } from "../room.ts";
import type { Connection } from "./connection.ts";

/**
 * Attached connections in attachment order. Rebuilds walk connections (and
 * their rooms) in this order, so identical event sequences produce identical
 * lists.
 */
export class ConnectionRegistry {
  private readonly entries: Connection[] = [];

  get connections(): ReadonlyArray<Connection> {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  has(connection: Connection): boolean {
    return this.entries.includes(connection);
  }

  /**
   * Returns false when the connection was already attached.
   */
  add(connection: Connection): boolean {
    if (this.has(connection)) return false;
    this.entries.push(connection);
    return true;
  }

  /**
   * Returns false when the connection was not attached.
   */
  remove(connection: Connection): boolean {
    const index = this.entries.indexOf(connection);
    if (index === -1) return false;
    this.entries.splice(index, 1);
    return true;
  }

  *rooms(): IterableIterator<Room> {
    for (const connection of this.entries) {
      yield* connection.rooms();
    }
  }

  totalRooms(): number {
    return this.entries.reduce(
      (total, connection) => total + connection.rooms().length,
      0,
    );
  }
}
