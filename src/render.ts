import type { RoomListModel } from "./model/room-list-model.ts";

/**
 * Plain-text rendering of the room list: one line per group with its room
 * count, followed by its rooms indented by two spaces.
 *
 * @example
 * ```text
 * Favourites (1)
 *   Standup [3]
 * work (2)
 *   Standup [3]
 *   Releases
 * ```
 */
export const renderRoomList = (model: RoomListModel): string => {
  const lines: string[] = [];
  for (let group = 0; group < model.groupCount; group++) {
    const count = model.roomCount(group);
    lines.push(`${model.groupLabelAt(group)} (${count})`);
    for (let room = 0; room < count; room++) {
      const row = model.roomRowAt({ group, room });
      if (row) {
        lines.push(`  ${row.label}`);
      }
    }
  }
  return lines.join("\n");
};
