import type { RoomAspect } from "../room.ts";

/**
 * A group row appeared at `group`.
 */
export interface GroupInserted {
  readonly type: "group-inserted";
  readonly group: number;
}

export interface RoomInserted {
  readonly type: "room-inserted";
  readonly group: number;
  readonly room: number;
}

export interface RoomRemoved {
  readonly type: "room-removed";
  readonly group: number;
  readonly room: number;
}

/**
 * Always follows the `room-removed` that emptied the group.
 */
export interface GroupRemoved {
  readonly type: "group-removed";
  readonly group: number;
}

/**
 * A room changed place inside its group. `to` is the room's index once the
 * move is done.
 */
export interface RoomMoved {
  readonly type: "room-moved";
  readonly group: number;
  readonly from: number;
  readonly to: number;
}

export interface DataChanged {
  readonly type: "data-changed";
  readonly group: number;
  readonly room: number;
  /**
   * Empty means every aspect may have changed.
   */
  readonly aspects: ReadonlySet<RoomAspect>;
}

/**
 * The whole list was rebuilt; every position obtained before is stale.
 */
export interface Reset {
  readonly type: "reset";
}

export type RoomListChange =
  | GroupInserted
  | RoomInserted
  | RoomRemoved
  | GroupRemoved
  | RoomMoved
  | DataChanged
  | Reset;

export type RoomListListener = (change: RoomListChange) => void;
