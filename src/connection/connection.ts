import type { JoinState, Room } from "../room.ts";

export type ConnectionEvents = {
  /**
   * A room appeared on the connection (new invite, new join).
   */
  roomAdded: [room: Room];
  /**
   * `room` takes the place of `prev`: an invitation was accepted or
   * rejected, or a previously left room was re-entered.
   */
  roomReplaced: [room: Room, prev: Room];
  /**
   * Delivered before the connection forgets about the room.
   */
  roomRemoved: [room: Room];
  disconnected: [];
};

/**
 * A live account session owning a mutable collection of rooms.
 */
export interface Connection {
  readonly id: string;
  readonly userId: string;

  rooms(): ReadonlyArray<Room>;
  room(id: string, joinState: JoinState): Room | undefined;
  roomsWithTag(tag: string): ReadonlyArray<Room>;

  on<K extends keyof ConnectionEvents>(
    event: K,
    listener: (...args: ConnectionEvents[K]) => void,
  ): () => void;
}
