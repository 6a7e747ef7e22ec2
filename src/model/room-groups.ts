import * as Either from "effect/Either";
import * as Option from "effect/Option";
import { DuplicateRoomError, InvalidPositionError } from "../errors.ts";
import type { RoomOrder } from "../order/room-order.ts";
import type { Room } from "../room.ts";
import { logError } from "../util/log.ts";

/**
 * Position of a room row: the group's index and the room's index inside it.
 * Only valid until the next structural change of the index.
 */
export interface RoomPosition {
  readonly group: number;
  readonly room: number;
}

export interface RoomGroup {
  readonly caption: string;
  readonly rooms: readonly Room[];
}

interface MutableRoomGroup {
  readonly caption: string;
  rooms: Room[];
}

export type InsertRoomResult =
  | { readonly _tag: "Inserted"; readonly position: RoomPosition }
  | { readonly _tag: "AlreadyPresent"; readonly position: RoomPosition }
  | { readonly _tag: "MissingGroup" };

export interface RemovedRoom {
  readonly room: Room;
  readonly caption: string;
  /**
   * The group became empty and was removed as well.
   */
  readonly groupRemoved: boolean;
}

/**
 * First index whose item is not less than `key`.
 */
const lowerBound = <A, K>(
  items: readonly A[],
  key: K,
  lessThan: (item: A, key: K) => boolean,
): number => {
  let low = 0;
  let high = items.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (lessThan(items[mid], key)) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
};

/**
 * Two-level ordered index: groups sorted by caption priority, each holding
 * its rooms sorted by that group's room comparator.
 *
 * Every structural change goes through `insertGroupIfAbsent`, `insertRoom`,
 * `removeRoom`, `moveRoom`, `removeRoomsWhere` and `rebuild`. The index does
 * not notify anybody; callers turn the returned positions into change
 * notifications.
 */
export class RoomGroups {
  private groups: MutableRoomGroup[] = [];

  constructor(private order: RoomOrder) {}

  get roomOrder(): RoomOrder {
    return this.order;
  }

  get size(): number {
    return this.groups.length;
  }

  groupAt(group: number): RoomGroup | undefined {
    return this.isValidGroup(group) ? this.groups[group] : undefined;
  }

  captionAt(group: number): string | undefined {
    return this.groupAt(group)?.caption;
  }

  roomCount(group: number): number {
    return this.groupAt(group)?.rooms.length ?? 0;
  }

  roomAt(position: RoomPosition): Room | undefined {
    return this.isValidRoom(position)
      ? this.groups[position.group].rooms[position.room]
      : undefined;
  }

  isValidGroup(group: number): boolean {
    return Number.isInteger(group) && group >= 0 && group < this.groups.length;
  }

  isValidRoom(position: RoomPosition): boolean {
    return (
      this.isValidGroup(position.group) &&
      Number.isInteger(position.room) &&
      position.room >= 0 &&
      position.room < this.groups[position.group].rooms.length
    );
  }

  private lowerBoundGroup(caption: string): number {
    return lowerBound(this.groups, caption, (group, key) =>
      this.order.groupLessThan(group.caption, key),
    );
  }

  private lowerBoundRoom(group: RoomGroup, room: Room): number {
    return lowerBound(
      group.rooms,
      room,
      this.order.roomLessThanFactory(group.caption),
    );
  }

  /**
   * Index of the group with this caption.
   */
  locateGroup(caption: string): Option.Option<number> {
    const position = this.lowerBoundGroup(caption);
    return this.groups[position]?.caption === caption
      ? Option.some(position)
      : Option.none();
  }

  /**
   * Where the room sits in the group with this caption, found the same way
   * insertion places it.
   */
  locate(caption: string, room: Room): Option.Option<RoomPosition> {
    return Option.flatMap(this.locateGroup(caption), (group) => {
      const position = this.lowerBoundRoom(this.groups[group], room);
      return this.groups[group].rooms[position] === room
        ? Option.some({ group, room: position })
        : Option.none();
    });
  }

  insertGroupIfAbsent(caption: string): {
    readonly position: number;
    readonly created: boolean;
  } {
    const position = this.lowerBoundGroup(caption);
    if (this.groups[position]?.caption === caption) {
      return { position, created: false };
    }
    this.groups.splice(position, 0, { caption, rooms: [] });
    return { position, created: true };
  }

  /**
   * Insert the room at its sorted place in an existing group.
   */
  insertRoom(caption: string, room: Room): InsertRoomResult {
    const located = this.locateGroup(caption);
    if (Option.isNone(located)) {
      return { _tag: "MissingGroup" };
    }
    const group = this.groups[located.value];
    const position = this.lowerBoundRoom(group, room);
    if (group.rooms[position] === room) {
      return {
        _tag: "AlreadyPresent",
        position: { group: located.value, room: position },
      };
    }
    group.rooms.splice(position, 0, room);
    return {
      _tag: "Inserted",
      position: { group: located.value, room: position },
    };
  }

  /**
   * Remove the room at the given position, and its group once empty.
   */
  removeRoom(
    position: RoomPosition,
  ): Either.Either<RemovedRoom, InvalidPositionError> {
    if (!this.isValidRoom(position)) {
      return Either.left(
        new InvalidPositionError({
          message: "Attempt to remove a room at an invalid position",
          group: position.group,
          room: position.room,
        }),
      );
    }
    const group = this.groups[position.group];
    const [room] = group.rooms.splice(position.room, 1);
    const groupRemoved = group.rooms.length === 0;
    if (groupRemoved) {
      this.groups.splice(position.group, 1);
    }
    return Either.right({ room, caption: group.caption, groupRemoved });
  }

  /**
   * Where the room now at `from` belongs once its sort key has changed,
   * expressed as its final index in the group.
   */
  sortedPositionAfterChange(
    position: RoomPosition,
  ): Either.Either<number, InvalidPositionError> {
    if (!this.isValidRoom(position)) {
      return Either.left(
        new InvalidPositionError({
          message: "Attempt to re-sort a room at an invalid position",
          group: position.group,
          room: position.room,
        }),
      );
    }
    const group = this.groups[position.group];
    const room = group.rooms[position.room];
    const others = group.rooms.filter((_, index) => index !== position.room);
    return Either.right(
      lowerBound(others, room, this.order.roomLessThanFactory(group.caption)),
    );
  }

  /**
   * Move a room inside its group. `to` is the room's index after the move.
   * Returns false when there was nothing to move.
   */
  moveRoom(
    group: number,
    from: number,
    to: number,
  ): Either.Either<boolean, InvalidPositionError> {
    if (
      !this.isValidRoom({ group, room: from }) ||
      !this.isValidRoom({ group, room: to })
    ) {
      return Either.left(
        new InvalidPositionError({
          message: `Attempt to move a room from ${from} to ${to}`,
          group,
          room: from,
        }),
      );
    }
    if (from === to) {
      return Either.right(false);
    }
    const rooms = this.groups[group].rooms;
    const [room] = rooms.splice(from, 1);
    rooms.splice(to, 0, room);
    return Either.right(true);
  }

  /**
   * Drop every room matching the predicate from every group, then drop the
   * groups left empty. Returns the number of room rows removed.
   */
  removeRoomsWhere(predicate: (room: Room) => boolean): number {
    let removed = 0;
    for (const group of this.groups) {
      const kept = group.rooms.filter((room) => !predicate(room));
      removed += group.rooms.length - kept.length;
      group.rooms = kept;
    }
    this.groups = this.groups.filter((group) => group.rooms.length > 0);
    return removed;
  }

  /**
   * Clear the index and insert every room from scratch, optionally under a
   * new ordering policy.
   */
  rebuild(rooms: Iterable<Room>, order: RoomOrder = this.order): void {
    this.order = order;
    this.groups = [];
    for (const room of rooms) {
      for (const caption of this.order.groups(room)) {
        this.insertGroupIfAbsent(caption);
        const result = this.insertRoom(caption, room);
        if (result._tag === "AlreadyPresent") {
          logError(
            "RoomGroups",
            "Duplicate insertion skipped",
            new DuplicateRoomError({
              message: `${room.id} is already listed under group ${caption}`,
              roomId: room.id,
              caption,
            }),
          );
        }
      }
    }
  }

  snapshot(): ReadonlyArray<RoomGroup> {
    return this.groups.map((group) => ({
      caption: group.caption,
      rooms: [...group.rooms],
    }));
  }
}
