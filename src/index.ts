export * from "./config.ts";
export type { Connection, ConnectionEvents } from "./connection/connection.ts";
export { ConnectionRegistry } from "./connection/registry.ts";
export * from "./errors.ts";
export { MemoryConnection } from "./memory/memory-connection.ts";
export {
  MemoryRoom,
  type MemoryRoomInit,
  type TagsInit,
} from "./memory/memory-room.ts";
export * from "./memory/snapshot.ts";
export type * from "./model/changes.ts";
export * from "./model/labels.ts";
export * from "./model/room-groups.ts";
export * from "./model/room-list-model.ts";
export * from "./order/index.ts";
export * from "./render.ts";
export * from "./room-list.ts";
export type {
  JoinState,
  Room,
  RoomAspect,
  RoomEvents,
  Tag,
} from "./room.ts";
export * from "./settings.ts";
