/**
 * Ordering policy for the room list.
 *
 * - Group order: priority list with namespace wildcards (tags-order.ts)
 * - Room order: per-tag order weight with identity tie-break (room-order.ts)
 * - Membership: which groups a room belongs to (membership.ts)
 */

export {
  DefaultTagsOrder,
  DirectChatCaption,
  FavouriteTag,
  LowPriorityTag,
  SystemCaptionPrefix,
  UntaggedCaption,
  findIndexWithWildcards,
  groupLessThan,
  isSystemCaption,
} from "./tags-order.ts";
export { membershipOf } from "./membership.ts";
export {
  compareRoomIdentity,
  roomLessThanFactory,
  tagRoomOrder,
  type Grouping,
  type RoomLessThan,
  type RoomOrder,
  type Sorting,
} from "./room-order.ts";
