import type { Connection } from "./connection/connection.ts";

/**
 * A room tag. `order` is the tag-specific weight used to sort rooms inside
 * the tag's group; `undefined` means the tag carries no explicit order.
 */
export interface Tag {
  readonly order?: number;
}

export type JoinState = "join" | "invite" | "leave";

/**
 * Display aspects a room change can affect. An empty set means all of them.
 */
export type RoomAspect =
  | "display"
  | "decoration"
  | "tooltip"
  | "unread"
  | "highlight"
  | "join-state";

export type RoomEvents = {
  /**
   * Emitted right before the tag set changes. Always followed by
   * `tagsChanged` in the same synchronous turn.
   */
  tagsAboutToChange: [];
  tagsChanged: [];
  displayAttributeChanged: [aspects: ReadonlySet<RoomAspect>];
};

/**
 * A chat room as seen by the room list. Rooms are owned by their connection;
 * the list only keeps references to them.
 */
export interface Room {
  readonly id: string;
  readonly connection: Connection;

  displayName(): string;
  tags(): ReadonlyMap<string, Tag>;
  tag(name: string): Tag | undefined;
  isDirectChat(): boolean;
  joinState(): JoinState;

  /**
   * Number of unread messages, or -1 when unknown.
   */
  unreadCount(): number;

  /**
   * True when the read marker is past the loaded timeline, so the real
   * unread count may be higher than `unreadCount()`.
   */
  unreadCountIsLowerBound(): boolean;
  hasUnreadMessages(): boolean;
  highlightCount(): number;

  removeTag(name: string): void;

  on<K extends keyof RoomEvents>(
    event: K,
    listener: (...args: RoomEvents[K]) => void,
  ): () => void;
}
