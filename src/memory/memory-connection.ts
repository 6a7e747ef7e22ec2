import type { Connection, ConnectionEvents } from "../connection/connection.ts";
import type { JoinState } from "../room.ts";
import { Emitter } from "../util/emitter.ts";
import { MemoryRoom, type MemoryRoomInit } from "./memory-room.ts";

/**
 * A connection whose rooms live in memory. Used to embed the room list
 * without a server, and to drive it in tests.
 */
export class MemoryConnection implements Connection {
  private readonly events = new Emitter<ConnectionEvents>();
  private roomList: MemoryRoom[] = [];

  constructor(
    readonly id: string,
    readonly userId: string = id,
  ) {}

  rooms(): ReadonlyArray<MemoryRoom> {
    return this.roomList;
  }

  room(id: string, joinState: JoinState): MemoryRoom | undefined {
    return this.roomList.find(
      (room) => room.id === id && room.joinState() === joinState,
    );
  }

  roomsWithTag(tag: string): ReadonlyArray<MemoryRoom> {
    return this.roomList.filter((room) => room.tag(tag) !== undefined);
  }

  on<K extends keyof ConnectionEvents>(
    event: K,
    listener: (...args: ConnectionEvents[K]) => void,
  ): () => void {
    return this.events.on(event, listener);
  }

  listenerCount(event: keyof ConnectionEvents): number {
    return this.events.listenerCount(event);
  }

  /**
   * Add a room without telling anybody. Meant for state that exists before
   * the connection is attached to a room list.
   */
  createRoom(init: MemoryRoomInit): MemoryRoom {
    const room = new MemoryRoom(this, init);
    this.roomList = [...this.roomList, room];
    return room;
  }

  /**
   * Add a room and announce it.
   */
  addRoom(init: MemoryRoomInit): MemoryRoom {
    const room = this.createRoom(init);
    this.events.emit("roomAdded", room);
    return room;
  }

  /**
   * Swap `prev` for a new incarnation of the same room and announce it.
   */
  replaceRoom(
    prev: MemoryRoom,
    init: Omit<MemoryRoomInit, "id"> & { readonly id?: string },
  ): MemoryRoom {
    const room = new MemoryRoom(this, { ...init, id: init.id ?? prev.id });
    this.roomList = this.roomList.map((existing) =>
      existing === prev ? room : existing,
    );
    if (!this.roomList.includes(room)) {
      this.roomList = [...this.roomList, room];
    }
    this.events.emit("roomReplaced", room, prev);
    return room;
  }

  /**
   * Announce the removal, then forget the room.
   */
  deleteRoom(room: MemoryRoom): void {
    if (!this.roomList.includes(room)) return;
    this.events.emit("roomRemoved", room);
    this.roomList = this.roomList.filter((existing) => existing !== room);
  }

  logout(): void {
    this.events.emit("disconnected");
  }
}
