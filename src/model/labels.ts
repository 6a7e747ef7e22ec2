import type { Connection } from "../connection/connection.ts";
import {
  DirectChatCaption,
  FavouriteTag,
  LowPriorityTag,
  UntaggedCaption,
} from "../order/tags-order.ts";
import type { JoinState, Room } from "../room.ts";

/**
 * What a presentation layer needs to draw one room row.
 */
export interface RoomRow {
  readonly room: Room;
  readonly label: string;
  readonly hasUnread: boolean;
  readonly highlightCount: number;
  readonly joinState: JoinState;
}

/**
 * Human-readable name of a group.
 *
 * @example
 * ```typescript
 * groupLabel("m.favourite") // "Favourites"
 * groupLabel("u.work") // "work"
 * ```
 */
export const groupLabel = (caption: string): string => {
  switch (caption) {
    case UntaggedCaption:
      return "Ungrouped rooms";
    case DirectChatCaption:
      return "People";
    case FavouriteTag:
      return "Favourites";
    case LowPriorityTag:
      return "Low priority";
    default:
      return caption.startsWith("u.") ? caption.slice(2) : caption;
  }
};

const unreadSuffix = (room: Room): string => {
  const count = room.unreadCount();
  if (count === -1) return "";
  return room.unreadCountIsLowerBound() ? ` [${count}+]` : ` [${count}]`;
};

/**
 * Room display name, disambiguated with the account when another attached
 * connection shows the same room, plus the unread count when known.
 */
export const roomLabel = (
  room: Room,
  connections: ReadonlyArray<Connection>,
): string => {
  const shared = connections.some(
    (connection) =>
      connection !== room.connection &&
      connection.room(room.id, room.joinState()) !== undefined,
  );
  const name = shared
    ? `${room.displayName()} (as ${room.connection.userId})`
    : room.displayName();
  return name + unreadSuffix(room);
};

export const roomRow = (
  room: Room,
  connections: ReadonlyArray<Connection>,
): RoomRow => ({
  room,
  label: roomLabel(room, connections),
  hasUnread: room.hasUnreadMessages(),
  highlightCount: room.highlightCount(),
  joinState: room.joinState(),
});
