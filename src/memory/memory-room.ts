import type { JoinState, Room, RoomAspect, RoomEvents, Tag } from "../room.ts";
import { Emitter } from "../util/emitter.ts";
import type { MemoryConnection } from "./memory-connection.ts";

export type TagsInit = Readonly<Record<string, Tag>> | Iterable<readonly [string, Tag]>;

export interface MemoryRoomInit {
  readonly id: string;
  readonly name?: string;
  readonly tags?: TagsInit;
  readonly directChat?: boolean;
  readonly joinState?: JoinState;
  readonly unreadCount?: number;
  readonly unreadCountIsLowerBound?: boolean;
  readonly highlightCount?: number;
}

const isIterable = (
  tags: TagsInit,
): tags is Iterable<readonly [string, Tag]> => Symbol.iterator in tags;

const toTagMap = (tags: TagsInit | undefined): Map<string, Tag> =>
  tags === undefined
    ? new Map()
    : isIterable(tags)
      ? new Map(tags)
      : new Map(Object.entries(tags));

/**
 * A room held entirely in memory. Every setter emits the event a live room
 * would emit for the same change.
 */
export class MemoryRoom implements Room {
  readonly id: string;
  private readonly events = new Emitter<RoomEvents>();
  private tagMap: Map<string, Tag>;
  private name: string;
  private directChat: boolean;
  private join: JoinState;
  private unread: number;
  private unreadLowerBound: boolean;
  private highlights: number;

  constructor(
    readonly connection: MemoryConnection,
    init: MemoryRoomInit,
  ) {
    this.id = init.id;
    this.tagMap = toTagMap(init.tags);
    this.name = init.name ?? init.id;
    this.directChat = init.directChat ?? false;
    this.join = init.joinState ?? "join";
    this.unread = init.unreadCount ?? -1;
    this.unreadLowerBound = init.unreadCountIsLowerBound ?? false;
    this.highlights = init.highlightCount ?? 0;
  }

  displayName(): string {
    return this.name;
  }

  tags(): ReadonlyMap<string, Tag> {
    return this.tagMap;
  }

  tag(name: string): Tag | undefined {
    return this.tagMap.get(name);
  }

  isDirectChat(): boolean {
    return this.directChat;
  }

  joinState(): JoinState {
    return this.join;
  }

  unreadCount(): number {
    return this.unread;
  }

  unreadCountIsLowerBound(): boolean {
    return this.unreadLowerBound;
  }

  hasUnreadMessages(): boolean {
    return this.unread > 0;
  }

  highlightCount(): number {
    return this.highlights;
  }

  on<K extends keyof RoomEvents>(
    event: K,
    listener: (...args: RoomEvents[K]) => void,
  ): () => void {
    return this.events.on(event, listener);
  }

  listenerCount(event: keyof RoomEvents): number {
    return this.events.listenerCount(event);
  }

  // ===========================================================================
  // Tag changes (always wrapped in tagsAboutToChange / tagsChanged)
  // ===========================================================================

  private changeTags(apply: () => void): void {
    this.events.emit("tagsAboutToChange");
    apply();
    this.events.emit("tagsChanged");
  }

  setTags(tags: TagsInit): void {
    this.changeTags(() => {
      this.tagMap = toTagMap(tags);
    });
  }

  /**
   * Add the tag, or update its order when the room already has it.
   */
  addTag(name: string, tag: Tag = {}): void {
    this.changeTags(() => {
      this.tagMap = new Map(this.tagMap).set(name, tag);
    });
  }

  removeTag(name: string): void {
    if (!this.tagMap.has(name)) return;
    this.changeTags(() => {
      const next = new Map(this.tagMap);
      next.delete(name);
      this.tagMap = next;
    });
  }

  /**
   * Direct-chat status decides membership, so it changes like a tag.
   */
  setDirectChat(directChat: boolean): void {
    if (this.directChat === directChat) return;
    this.changeTags(() => {
      this.directChat = directChat;
    });
  }

  // ===========================================================================
  // Display attributes
  // ===========================================================================

  private changed(...aspects: RoomAspect[]): void {
    this.events.emit("displayAttributeChanged", new Set(aspects));
  }

  setDisplayName(name: string): void {
    this.name = name;
    this.changed();
  }

  setAvatar(): void {
    this.changed("decoration");
  }

  setUnreadCount(count: number, lowerBound = false): void {
    this.unread = count;
    this.unreadLowerBound = lowerBound;
    this.changed("display", "unread");
  }

  setHighlightCount(count: number): void {
    this.highlights = count;
    this.changed("highlight");
  }

  setJoinState(joinState: JoinState): void {
    this.join = joinState;
    this.changed();
  }
}
