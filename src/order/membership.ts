import type { Room } from "../room.ts";
import { DirectChatCaption, UntaggedCaption } from "./tags-order.ts";

/**
 * Captions of every group the room belongs to right now.
 *
 * The room's tag names come first, in the order its tag map yields them,
 * followed by the direct-chat group for direct chats unless a tag already
 * names it, so captions never repeat. A room that would otherwise belong
 * nowhere goes to the untagged group, so the result is never empty.
 */
export const membershipOf = (room: Room): string[] => {
  const groups = [...room.tags().keys()];
  if (room.isDirectChat() && !groups.includes(DirectChatCaption)) {
    groups.push(DirectChatCaption);
  }
  if (groups.length === 0) {
    groups.push(UntaggedCaption);
  }
  return groups;
};
