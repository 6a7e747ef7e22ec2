import * as Data from "effect/Data";

/**
 * The index disagrees with what a room's tags say it should contain.
 */
export class IntegrityError extends Data.TaggedError("IntegrityError")<{
  readonly message: string;
  readonly roomId?: string;
  readonly caption?: string;
}> {}

/**
 * A room was inserted into a group that already lists it.
 */
export class DuplicateRoomError extends Data.TaggedError("DuplicateRoomError")<{
  readonly message: string;
  readonly roomId: string;
  readonly caption: string;
}> {}

/**
 * A group or room position that does not exist in the index.
 */
export class InvalidPositionError extends Data.TaggedError(
  "InvalidPositionError",
)<{
  readonly message: string;
  readonly group: number;
  readonly room?: number;
}> {}

/**
 * A tag update started while another one was still being applied.
 */
export class ReentrantUpdateError extends Data.TaggedError(
  "ReentrantUpdateError",
)<{
  readonly message: string;
  readonly roomId: string;
  readonly pendingRoomId: string;
}> {}

/**
 * Reading, parsing or writing the settings file failed.
 */
export class SettingsError extends Data.TaggedError("SettingsError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

/**
 * Reading or decoding a room list snapshot failed.
 */
export class SnapshotError extends Data.TaggedError("SnapshotError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

/**
 * Errors the room list model reports about its own state.
 */
export type RoomListError =
  | IntegrityError
  | DuplicateRoomError
  | InvalidPositionError
  | ReentrantUpdateError;
