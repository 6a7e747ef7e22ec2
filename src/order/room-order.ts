import type { Room } from "../room.ts";
import { logWarning } from "../util/log.ts";
import { membershipOf } from "./membership.ts";
import { DefaultTagsOrder, groupLessThan } from "./tags-order.ts";

export type RoomLessThan = (left: Room, right: Room) => boolean;

/**
 * How rooms are split into groups. Only tag grouping exists today.
 */
export type Grouping = "tag";

/**
 * How rooms are sorted inside a group. Only the tag order weight exists today.
 */
export type Sorting = "order";

/**
 * A complete ordering policy. The three functions are only meaningful
 * together: swapping any of them requires rebuilding the whole list.
 */
export interface RoomOrder {
  readonly grouping: Grouping;
  readonly sorting: Sorting;
  readonly tagsOrder: readonly string[];
  readonly groupLessThan: (left: string, right: string) => boolean;
  readonly roomLessThanFactory: (caption: string) => RoomLessThan;
  readonly groups: (room: Room) => string[];
}

const serials = new WeakMap<Room, number>();
let nextSerial = 0;

const serialOf = (room: Room): number => {
  let serial = serials.get(room);
  if (serial === undefined) {
    serial = nextSerial++;
    serials.set(room, serial);
  }
  return serial;
};

const compareStrings = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

/**
 * Total order over room identities: room id, then owning connection.
 * Distinct objects agreeing on both (an invite and a joined room with the
 * same id on one connection) are ordered by first sight. Serials are shared
 * by the whole process, so that last step is stable within one run but not
 * across separately built processes.
 */
export const compareRoomIdentity = (left: Room, right: Room): number => {
  if (left === right) return 0;
  return (
    compareStrings(left.id, right.id) ||
    compareStrings(left.connection.id, right.connection.id) ||
    serialOf(left) - serialOf(right)
  );
};

/**
 * Order weight of the room under `caption`. Non-finite weights count as
 * omitted.
 */
const weightOf = (room: Room, caption: string): number | undefined => {
  const order = room.tag(caption)?.order;
  return order !== undefined && Number.isFinite(order) ? order : undefined;
};

/**
 * Room comparator for the group with the given caption.
 *
 * Rooms with an explicit order weight for the caption come first, lower
 * weights first. Rooms without one follow, ordered by identity. Two distinct
 * rooms with the same weight are reported and ordered by identity as well.
 */
export const roomLessThanFactory =
  (caption: string): RoomLessThan =>
  (left, right) => {
    if (left === right) return false;

    const lo = weightOf(left, caption);
    const ro = weightOf(right, caption);
    if (ro === undefined) {
      // TODO: tie-break on display name once name changes re-sort rooms
      return lo !== undefined || compareRoomIdentity(left, right) < 0;
    }
    if (lo === undefined) return false;

    if (lo < ro) return true;
    if (lo > ro) return false;

    logWarning("RoomOrder", `${caption} order values aren't strongly ordered`, {
      left: left.id,
      right: right.id,
      order: lo,
    });
    return compareRoomIdentity(left, right) < 0;
  };

/**
 * Group by tag, sort by the tag's order weight.
 */
export const tagRoomOrder = (
  tagsOrder: readonly string[] = DefaultTagsOrder,
): RoomOrder => ({
  grouping: "tag",
  sorting: "order",
  tagsOrder,
  groupLessThan: groupLessThan(tagsOrder),
  roomLessThanFactory,
  groups: membershipOf,
});
