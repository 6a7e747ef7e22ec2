import { describe, expect, it } from "vitest";
import { MemoryConnection } from "../src/memory/memory-connection.ts";
import { RoomListModel } from "../src/model/room-list-model.ts";
import { renderRoomList } from "../src/render.ts";

describe("renderRoomList", () => {
  it("renders groups with their rooms", () => {
    const work = new MemoryConnection("work", "@me:work.example");
    const home = new MemoryConnection("home", "@me:home.example");
    work.createRoom({
      id: "!standup",
      name: "Standup",
      unreadCount: 3,
      tags: { "m.favourite": {}, "u.work": { order: 0.1 } },
    });
    work.createRoom({ id: "!releases", name: "Releases", tags: { "u.work": { order: 0.5 } } });
    work.createRoom({
      id: "!alice",
      name: "Alice",
      directChat: true,
      unreadCount: 12,
      unreadCountIsLowerBound: true,
    });
    work.createRoom({ id: "!random", name: "Random" });
    home.createRoom({ id: "!standup", name: "Standup", tags: { "u.work": {} } });

    const model = new RoomListModel();
    model.addConnection(work);
    model.addConnection(home);

    expect(renderRoomList(model)).toBe(
      [
        "Favourites (1)",
        "  Standup (as @me:work.example) [3]",
        "work (3)",
        "  Standup (as @me:work.example) [3]",
        "  Releases",
        "  Standup (as @me:home.example)",
        "People (1)",
        "  Alice [12+]",
        "Ungrouped rooms (1)",
        "  Random",
      ].join("\n"),
    );
  });

  it("renders an empty list as nothing", () => {
    expect(renderRoomList(new RoomListModel())).toBe("");
  });
});
